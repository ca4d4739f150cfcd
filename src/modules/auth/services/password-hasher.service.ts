import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { compare, hash } from 'bcryptjs';
import { AuthConfig, authConfig } from '../../../core/config';

@Injectable()
export class PasswordHasherService implements OnModuleInit {
  private dummyHash: string | null = null;

  constructor(@Inject(authConfig.KEY) private readonly config: AuthConfig) {}

  async onModuleInit(): Promise<void> {
    await this.prepareDummyHash();
  }

  hash(plain: string): Promise<string> {
    return hash(plain, this.config.bcryptRounds);
  }

  verify(plain: string, hashed: string): Promise<boolean> {
    return compare(plain, hashed);
  }

  /**
   * Spend the time of one real comparison and report no match. Used when the
   * account does not exist so that both failure paths take as long.
   */
  async verifyAgainstNothing(plain: string): Promise<false> {
    const dummy = this.dummyHash ?? (await this.prepareDummyHash());
    await compare(plain, dummy);
    return false;
  }

  private async prepareDummyHash(): Promise<string> {
    const dummy = await this.hash('unused-account-placeholder');
    this.dummyHash = dummy;
    return dummy;
  }
}
