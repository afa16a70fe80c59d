import { syncCommand, type GlobalOptions } from './sync/sync';

export { syncCommand, type GlobalOptions };
