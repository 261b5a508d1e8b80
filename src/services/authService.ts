import { AppError, AuthenticationError, DuplicateUserError } from '../errors';
import type { DataStore } from '../store';
import type { User } from '../types';
import { toIso } from '../utils';
import type { PasswordService } from './passwordService';
import type { TokenService } from './tokenService';

const SUBJECT_PATTERN = /^[1-9]\d*$/;

export interface LoginResult {
  user: User;
  accessToken: string;
}

export class AuthService {
  private readonly placeholderHash: string;

  constructor(
    private readonly store: DataStore,
    private readonly passwords: PasswordService,
    private readonly tokens: TokenService
  ) {
    this.placeholderHash = passwords.hash('placeholder-password');
  }

  async register(params: { username: string; email: string; password: string }): Promise<User> {
    this.validatePassword(params.password);

    if (await this.store.getUserByUsername(params.username)) {
      throw new DuplicateUserError('username');
    }
    if (await this.store.getUserByEmail(params.email)) {
      throw new DuplicateUserError('email');
    }

    return this.store.createUser({
      username: params.username,
      email: params.email,
      passwordHash: this.passwords.hash(params.password),
      createdAt: toIso(Date.now())
    });
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.store.getUserByUsername(username);
    // Unknown usernames still pay for one scrypt run.
    const matches = this.passwords.verify(password, user?.passwordHash ?? this.placeholderHash);
    if (!user || !matches) {
      throw new AuthenticationError('InvalidCredentials', 'Incorrect username or password');
    }
    if (!user.isActive) {
      throw new AuthenticationError('InactiveIdentity', 'Inactive user');
    }
    return { user, accessToken: this.tokens.issue(user.id) };
  }

  async authenticate(token: string | undefined): Promise<User> {
    if (!token) {
      throw new AuthenticationError('InvalidToken', 'Not authenticated');
    }
    const claims = this.tokens.verify(token);
    if (!SUBJECT_PATTERN.test(claims.sub)) {
      throw new AuthenticationError('InvalidToken', 'Invalid user ID format');
    }
    const user = await this.store.getUserById(Number(claims.sub));
    if (!user) {
      throw new AuthenticationError('InvalidToken', 'User not found');
    }
    if (!user.isActive) {
      throw new AuthenticationError('InactiveIdentity', 'Inactive user');
    }
    return user;
  }

  async setActive(userId: number, active: boolean): Promise<void> {
    const user = await this.store.getUserById(userId);
    if (!user) {
      throw new AppError(404, 40402, 'User not found');
    }
    await this.store.setUserActive(userId, active, toIso(Date.now()));
  }

  private validatePassword(password: string): void {
    if (password.length < 8) {
      throw new AppError(400, 40003, 'Password must be at least 8 characters long');
    }
    if (!/\d/.test(password)) {
      throw new AppError(400, 40003, 'Password must contain at least one digit');
    }
    if (!/[A-Z]/.test(password)) {
      throw new AppError(400, 40003, 'Password must contain at least one uppercase letter');
    }
    if (!/[a-z]/.test(password)) {
      throw new AppError(400, 40003, 'Password must contain at least one lowercase letter');
    }
  }
}
