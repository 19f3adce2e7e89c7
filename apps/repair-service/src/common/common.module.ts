import { Global, Module } from '@nestjs/common';
import { CLOCK, ID_GENERATOR, SystemClock, UuidGenerator } from './clock/clock';

@Global()
@Module({
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    { provide: ID_GENERATOR, useClass: UuidGenerator },
  ],
  exports: [CLOCK, ID_GENERATOR],
})
export class CommonModule {}
