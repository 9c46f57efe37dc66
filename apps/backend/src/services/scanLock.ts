export interface ScanLockHandle {
  readonly owner: string;
  release(): void;
}

/**
 * Process-wide advisory lock: at most one owner runs the scan pipeline at a
 * time. The current owner may re-acquire; the lock frees once every handle
 * has been released.
 */
export class ScanLock {
  private owner: string | null = null;
  private holds = 0;

  tryAcquire(owner: string): ScanLockHandle | null {
    if (this.owner !== null && this.owner !== owner) {
      return null;
    }

    this.owner = owner;
    this.holds += 1;

    let released = false;
    return {
      owner,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.holds -= 1;
        if (this.holds === 0) {
          this.owner = null;
        }
      },
    };
  }

  isHeld(): boolean {
    return this.owner !== null;
  }

  currentOwner(): string | null {
    return this.owner;
  }

  holdCount(): number {
    return this.holds;
  }
}

export const scanLock = new ScanLock();

export default scanLock;
