import type { User } from '../../entities/user.js';

export interface UserDirectoryPort {
  findActiveUser(userId: string): Promise<User | null>;
  listUsers(): Promise<User[]>;
}
