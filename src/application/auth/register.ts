import { Password } from '../../domain/auth/password.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  username: string;
  password: string;
}

export interface RegisterResult {
  userId: number;
  username: string;
}

export class RegisterUseCase {
  constructor(private userRepo: UserRepo) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const existing = this.userRepo.findByUsername(command.username);
    if (existing) {
      throw new ConflictError('Username already exists');
    }

    const passwordHash = await Password.hash(command.password);

    // The unique index still guards against a concurrent registration
    // that slipped in while the password was hashing.
    const user = this.userRepo.create(command.username, passwordHash);

    return {
      userId: user.id,
      username: user.username,
    };
  }
}
