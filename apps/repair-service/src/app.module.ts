import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { DatabaseModule } from '@repairflow/database';

import { validateEnvironment } from './config/environment.validation';
import { CommonModule } from './common/common.module';
import { AuditModule } from './audit/audit.module';
import { PersistenceModule } from './persistence/persistence.module';

// Feature Modules
import { AssignmentModule } from './assignment/assignment.module';
import { FeedbackModule } from './feedback/feedback.module';
import { FeesModule } from './fees/fees.module';
import { LogsModule } from './logs/logs.module';
import { OrdersModule } from './orders/orders.module';
import { RollbackModule } from './rollback/rollback.module';
import { VehiclesModule } from './vehicles/vehicles.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),

    // Database
    DatabaseModule,

    // Event Emitter
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),

    CommonModule,
    AuditModule,
    PersistenceModule,

    // Feature Modules
    AssignmentModule,
    FeedbackModule,
    FeesModule,
    LogsModule,
    OrdersModule,
    RollbackModule,
    VehiclesModule,
  ],
})
export class AppModule {}
