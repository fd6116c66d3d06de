// packages/core/src/engine/index.ts -- barrel re-export

export { CancellationToken, CancellationError } from './cancellation.js';
export { EventBus } from './event-bus.js';
