import { Module } from '@nestjs/common';
import { TimelockService } from './timelock.service';

@Module({
  providers: [TimelockService],
  exports: [TimelockService],
})
export class TimelockModule {}
