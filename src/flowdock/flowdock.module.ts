import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from '../common/common.module';
import { FlowdockService } from './flowdock.service';

@Module({
  imports: [HttpModule, ConfigModule, CommonModule],
  providers: [FlowdockService],
  exports: [FlowdockService],
})
export class FlowdockModule {}
