/**
 * Turns a committed query into the titles shown in the results list, in
 * display order.
 */
export interface SearchProvider {
  search(query: string): Promise<readonly string[]>;
}

/**
 * Opens or plays a result outside the terminal UI. Declared for the list
 * cursor that will fill `AppState.selectedItem`; nothing calls it yet.
 */
export interface MediaLauncher {
  launch(item: string): Promise<void>;
}
