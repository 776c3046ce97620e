export * from './types';
export * from './errors';
export * from './routeKey';
export * from './document';
export * from './merge';
export * from './registry';
export * from './collector';
export * from './config';
export * from './security';
export * from './plugin';
export * from './visualizers';
