export * from './marketplace.constants';
export * from './marketplace.client';
export * from './marketplace.session';
export * from './marketplace.module';
export * from './page-parsers';
