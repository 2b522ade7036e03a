/**
 * Error Module Exports
 */

export * from './ProviderError';
