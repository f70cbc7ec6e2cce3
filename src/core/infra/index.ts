/**
 * Project: Eventor Client
 * File: src/core/infra/index.ts
 * Summary: Barrel exports for infrastructure adapters.
 */

export * from './logger/pinoLogger';
