import type { User } from '@usersvc/contracts';

import { NotFoundError, ValidationError } from './errors';
import type { UserStore } from './users-store';

export class UserService {
  constructor(private readonly store: UserStore) {}

  createUser(name: string): User {
    const trimmed = name.trim();
    if (trimmed === '') {
      throw new ValidationError('missing required fields', ['name is required']);
    }
    return this.store.create(trimmed);
  }

  getUser(id: number): User {
    const found = this.store.get(id);
    if (!found.ok) {
      throw new NotFoundError();
    }
    return found.value;
  }

  deleteUser(id: number): void {
    if (!this.store.delete(id)) {
      throw new NotFoundError();
    }
  }

  listUsers(): User[] {
    return this.store.list();
  }

  countUsers(): number {
    return this.store.size();
  }
}
