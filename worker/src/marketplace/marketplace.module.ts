import { Module } from '@nestjs/common';
import { MarketplaceSessionFactory } from './marketplace.session';
import { MARKETPLACE_SESSIONS } from './marketplace.constants';

@Module({
  providers: [
    MarketplaceSessionFactory,
    { provide: MARKETPLACE_SESSIONS, useExisting: MarketplaceSessionFactory },
  ],
  exports: [MARKETPLACE_SESSIONS],
})
export class MarketplaceModule {}
