import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from '../common/common.module';
import { FlowdockModule } from '../flowdock/flowdock.module';
import { SalesforceModule } from '../salesforce/salesforce.module';
import { StateModule } from '../state/state.module';
import { SyncService } from './sync.service';

@Module({
  imports: [
    ConfigModule,
    CommonModule,
    SalesforceModule,
    FlowdockModule,
    StateModule,
  ],
  providers: [SyncService],
  exports: [SyncService],
})
export class SyncModule {}
