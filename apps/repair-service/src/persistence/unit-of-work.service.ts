import { Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { isRepairError, StoreUnavailableError } from '../common/errors/repair.errors';

/**
 * Runs one operation against the store. Writes go through `run`, which opens a
 * transaction; the manager handed to `work` is the only handle repositories may
 * write with, so a row change and its audit entry commit or roll back together.
 */
@Injectable()
export class UnitOfWork {
  private readonly logger = new Logger(UnitOfWork.name);

  constructor(private readonly dataSource: DataSource) {}

  async run<T>(operation: string, work: (manager: EntityManager) => Promise<T>): Promise<T> {
    try {
      return await this.dataSource.transaction((manager) => work(manager));
    } catch (error) {
      throw this.translate(operation, error);
    }
  }

  async read<T>(operation: string, work: (manager: EntityManager) => Promise<T>): Promise<T> {
    try {
      return await work(this.dataSource.manager);
    } catch (error) {
      throw this.translate(operation, error);
    }
  }

  private translate(operation: string, error: unknown): Error {
    if (isRepairError(error)) {
      return error;
    }

    this.logger.error(`Unit of work '${operation}' failed`, {
      operation,
      error: error instanceof Error ? error.message : String(error),
    });
    return new StoreUnavailableError(operation, error);
  }
}
