import { FileUtils } from './io/file';
import { PathUtils } from './io/path';
import { HashUtils } from './helpers/hash';
import { CompressionUtils } from './helpers/compress';
import { logger } from './cli/logger';
import { display } from './cli/display';
import { Queue } from './helpers/queue';

export { FileUtils, HashUtils, CompressionUtils, logger, display, Queue, PathUtils };
