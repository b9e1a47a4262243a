import type { User } from '@usersvc/contracts';

export type StoreResult<T> = { ok: true; value: T } | { ok: false };

export type Clock = () => Date;

/**
 * In-memory table of users for the lifetime of the process.
 *
 * Every method is synchronous, so on the event loop each call completes
 * before another request's handler can observe or change the table. Ids come
 * from a counter that only moves forward; deleted ids are never handed out
 * again.
 */
export class UserStore {
  private nextId = 1;

  private readonly items = new Map<number, User>();

  constructor(private readonly clock: Clock = () => new Date()) {}

  create(name: string): User {
    const user: User = Object.freeze({
      id: this.nextId,
      name,
      createdAt: this.clock().toISOString(),
    });
    this.items.set(user.id, user);
    this.nextId += 1;
    return user;
  }

  get(id: number): StoreResult<User> {
    const user = this.items.get(id);
    if (!user) return { ok: false };
    return { ok: true, value: user };
  }

  delete(id: number): boolean {
    return this.items.delete(id);
  }

  // Callers must not rely on the order.
  list(): User[] {
    return [...this.items.values()];
  }

  size(): number {
    return this.items.size;
  }
}
