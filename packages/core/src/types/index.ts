// packages/core/src/types/index.ts -- barrel re-export

export type * from './connection.js';
export type * from './jobs.js';
export type * from './rest.js';
export type * from './events.js';
export type * from './config.js';
