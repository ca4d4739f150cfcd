import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { isUUID } from 'class-validator';
import { Not, Repository } from 'typeorm';
import {
  NewPrincipal,
  Principal,
  PrincipalChanges,
} from '../../domain/users';
import { UserEntity } from '../entities';
import { UsersRepository } from '../repositories';
import { toDuplicateIdentity } from './unique-violation';

@Injectable()
export class TypeOrmUsersRepository extends UsersRepository {
  constructor(
    @InjectRepository(UserEntity)
    private readonly users: Repository<UserEntity>,
  ) {
    super();
  }

  async findById(id: string): Promise<Principal | null> {
    // pg rejects malformed uuids with a syntax error
    if (!isUUID(id)) return null;
    return this.users.findOne({ where: { id } });
  }

  findByUsername(username: string): Promise<Principal | null> {
    return this.users.findOne({ where: { username } });
  }

  findByEmail(email: string): Promise<Principal | null> {
    return this.users.findOne({ where: { email } });
  }

  listExcept(excludeId: string, limit: number): Promise<Principal[]> {
    return this.users.find({
      where: { id: Not(excludeId) },
      order: { createdAt: 'DESC' },
      take: limit,
    });
  }

  async create(data: NewPrincipal): Promise<Principal> {
    try {
      return await this.users.save(this.users.create(data));
    } catch (error) {
      throw toDuplicateIdentity(error);
    }
  }

  async update(id: string, changes: PrincipalChanges): Promise<Principal | null> {
    if (!isUUID(id)) return null;
    const existing = await this.users.findOne({ where: { id } });
    if (!existing) return null;

    try {
      return await this.users.save(this.users.merge(existing, changes));
    } catch (error) {
      throw toDuplicateIdentity(error);
    }
  }

  async delete(id: string): Promise<boolean> {
    if (!isUUID(id)) return false;
    const result = await this.users.delete({ id });
    return (result.affected ?? 0) > 0;
  }
}
