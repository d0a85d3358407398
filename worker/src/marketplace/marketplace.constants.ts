/**
 * Injection token for the MarketplaceSessionProvider
 */
export const MARKETPLACE_SESSIONS = Symbol('MARKETPLACE_SESSIONS');
