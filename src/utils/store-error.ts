export type StoreName = "catalog" | "log";

// Raised by repositories when the backing store cannot be reached.
export class StoreUnavailableError extends Error {
  readonly store: StoreName;

  constructor(store: StoreName, message: string) {
    super(message);
    this.name = "StoreUnavailableError";
    this.store = store;
  }
}
