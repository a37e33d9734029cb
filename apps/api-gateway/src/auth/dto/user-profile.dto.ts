import type { User } from '@tokengate/database';

/**
 * Public view of the authenticated user. Never includes passwordHash.
 */
export class UserProfileDto {
  id: number;
  username: string;
  email: string | null;

  private constructor(id: number, username: string, email: string | null) {
    this.id = id;
    this.username = username;
    this.email = email;
  }

  /**
   * The only way to build this DTO, so the hash cannot slip into a response.
   */
  static fromEntity(user: User): UserProfileDto {
    return new UserProfileDto(user.id, user.username, user.email);
  }
}
