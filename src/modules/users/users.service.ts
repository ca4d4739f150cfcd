import { Injectable } from '@nestjs/common';
import { DuplicateIdentityError, NotFoundError } from '../../core/errors';
import { logger } from '../../core/logger/logger.config';
import { Clock } from '../../core/time/clock';
import { UsersRepository } from '../../database/repositories';
import { Principal, PrincipalChanges } from '../../domain/users';
import { PasswordHasherService } from '../auth/services/password-hasher.service';
import { UpdateUserDto } from './dto';

const DEFAULT_LIST_LIMIT = 100;

@Injectable()
export class UsersService {
  private readonly logger = logger();

  constructor(
    private readonly users: UsersRepository,
    private readonly hasher: PasswordHasherService,
    private readonly clock: Clock,
  ) {}

  listOthers(principal: Principal, limit?: number): Promise<Principal[]> {
    return this.users.listExcept(principal.id, limit ?? DEFAULT_LIST_LIMIT);
  }

  async get(id: string): Promise<Principal> {
    const principal = await this.users.findById(id);
    if (!principal) throw new NotFoundError('User');
    return principal;
  }

  async updateProfile(principal: Principal, dto: UpdateUserDto): Promise<Principal> {
    const newUsername =
      dto.username !== principal.username ? dto.username : undefined;
    if (newUsername !== undefined) {
      if (await this.users.findByUsername(newUsername)) {
        throw new DuplicateIdentityError('username');
      }
    }
    if (dto.email !== undefined && dto.email !== principal.email) {
      if (await this.users.findByEmail(dto.email)) {
        throw new DuplicateIdentityError('email');
      }
    }

    const changes: PrincipalChanges = {
      username: dto.username,
      email: dto.email,
      firstName: dto.first_name,
      lastName: dto.last_name,
      phoneNumber: dto.phone_number,
    };
    if (newUsername !== undefined) {
      changes.usernameChangedAt = this.clock.now();
    }
    if (dto.password !== undefined) {
      changes.passwordHash = await this.hasher.hash(dto.password);
    }

    const updated = await this.users.update(principal.id, changes);
    if (!updated) throw new NotFoundError('User');

    this.logger.info({ userId: updated.id }, 'Profile updated');
    return updated;
  }

  async delete(id: string): Promise<void> {
    if (!(await this.users.delete(id))) {
      throw new NotFoundError('User');
    }
    this.logger.info({ userId: id }, 'User deleted');
  }
}
