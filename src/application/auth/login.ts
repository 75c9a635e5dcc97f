import { Password } from '../../domain/auth/password.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { UnauthorizedError } from '../errors.js';
import { issueToken, TokenSettings } from './token.js';

export interface LoginCommand {
  username: string;
  password: string;
}

export interface LoginResult {
  token: string;
  tokenType: 'Bearer';
  expiresIn: number;
  userId: number;
  username: string;
}

const INVALID_CREDENTIALS = 'Invalid username or password';

export class LoginUseCase {
  constructor(
    private userRepo: UserRepo,
    private settings: TokenSettings
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = this.userRepo.findByUsername(command.username);
    if (!user) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const token = issueToken({ userId: user.id, username: user.username }, this.settings);

    return {
      token,
      tokenType: 'Bearer',
      expiresIn: this.settings.accessTokenExpireMinutes * 60,
      userId: user.id,
      username: user.username,
    };
  }
}
