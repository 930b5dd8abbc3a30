import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StateStore } from './state.store';

@Module({
  imports: [ConfigModule],
  providers: [StateStore],
  exports: [StateStore],
})
export class StateModule {}
