import { Module } from '@nestjs/common';
import { SinksModule } from '../sinks/sinks.module';
import { ShadowStateStore } from './services/shadow-state.store';

@Module({
  imports: [SinksModule],
  providers: [ShadowStateStore],
  exports: [ShadowStateStore],
})
export class ChangeDetectionModule {}
