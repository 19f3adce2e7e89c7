export * from './entities';
export * from './config/typeorm.config';
export * from './database.module';
