import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from '../common/common.module';
import { ChatterService } from './chatter.service';
import { OpportunityService } from './opportunity.service';
import { SalesforceAuthService } from './salesforce-auth.service';
import { SalesforceClient } from './salesforce.client';
import { SoqlSanitizer } from './soql.sanitizer';
import { TokenStore } from './token.store';

@Module({
  imports: [HttpModule, ConfigModule, CommonModule],
  providers: [
    TokenStore,
    SalesforceAuthService,
    SoqlSanitizer,
    SalesforceClient,
    OpportunityService,
    ChatterService,
  ],
  exports: [
    SalesforceAuthService,
    SalesforceClient,
    OpportunityService,
    ChatterService,
  ],
})
export class SalesforceModule {}
