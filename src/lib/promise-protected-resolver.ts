/**
 * A promise with its resolve/reject handles exposed, settled at most once
 *
 * Later calls to `resolveOnce()` or `rejectOnce()` are ignored, which lets
 * several code paths race to settle it without checking each other.
 */
export class PromiseProtectedResolver<T> {
  public readonly promise: Promise<T>;

  public get hasSettled(): boolean {
    return this._hasSettled;
  }

  private _hasSettled = false;
  private resolveHandler: (value: T) => void = () => {};
  private rejectHandler: (reason?: unknown) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveHandler = resolve;
      this.rejectHandler = reject;
    });
  }

  /**
   * @returns true if this call settled the promise
   */
  public resolveOnce(value: T): boolean {
    if (this._hasSettled) {
      return false;
    }

    this._hasSettled = true;
    this.resolveHandler(value);
    return true;
  }

  /**
   * @returns true if this call settled the promise
   */
  public rejectOnce(reason?: unknown): boolean {
    if (this._hasSettled) {
      return false;
    }

    this._hasSettled = true;
    this.rejectHandler(reason);
    return true;
  }
}
