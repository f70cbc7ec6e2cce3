export * from './event';
export * from './organisation';
export * from './person';
export * from './result';
