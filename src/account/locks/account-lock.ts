export type ReleaseFn = () => void;

type Waiter = (release: ReleaseFn) => void;

/**
 * Exclusión mutua FIFO para una sola cuenta.
 *
 * Al liberar, el lock pasa directo al siguiente en la cola: nadie puede
 * colarse entre dos operaciones encoladas. No es reentrante: pedir un lock
 * que ya se tiene espera hasta el timeout.
 */
export class AccountLock {
  private locked = false;
  private readonly waiters: Waiter[] = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Resuelve con la función de liberación cuando se obtiene el lock, o con
   * null si no se obtuvo dentro de `timeoutMs`.
   */
  acquire(timeoutMs: number): Promise<ReleaseFn | null> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve) => {
      const waiter: Waiter = (release) => {
        clearTimeout(timer);
        resolve(release);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
