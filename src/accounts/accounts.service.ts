import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Not, Repository } from 'typeorm';
import { DuplicateConstraintException } from '../common/exceptions/duplicate-constraint.exception';
import { Account } from './entities/account.entity';

export type UniqueAccountField = 'email' | 'phone';

const DUPLICATE_MESSAGES: Record<UniqueAccountField, string> = {
  email: 'Email already registered',
  phone: 'Phone number already registered',
};

/**
 * Lookups across both roles. Email and phone are unique over the whole
 * accounts table, so a mechanic cannot register a customer's email.
 */
@Injectable()
export class AccountsService {
  private readonly logger = new Logger(AccountsService.name);

  constructor(
    @InjectRepository(Account)
    private readonly accountRepository: Repository<Account>,
  ) {}

  existsByField(
    field: UniqueAccountField,
    value: string,
    excludeId?: number,
  ): Promise<boolean> {
    const where: FindOptionsWhere<Account> =
      field === 'email' ? { email: value } : { phone: value };
    if (excludeId !== undefined) {
      where.id = Not(excludeId);
    }
    return this.accountRepository.existsBy(where);
  }

  /**
   * Pre-checks uniqueness before an insert or update. The unique indexes
   * still back this up under concurrent writes.
   */
  async assertUnique(
    values: Partial<Record<UniqueAccountField, string>>,
    excludeId?: number,
  ): Promise<void> {
    const fields: UniqueAccountField[] = ['email', 'phone'];
    for (const field of fields) {
      const value = values[field];
      if (value === undefined) continue;

      if (await this.existsByField(field, value, excludeId)) {
        this.logger.warn(`Duplicate ${field} rejected`);
        throw new DuplicateConstraintException(DUPLICATE_MESSAGES[field]);
      }
    }
  }
}
