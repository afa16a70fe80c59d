import { GitIndex } from './git-index';
import { IndexEntry } from './index-entry';
import { GitFileMode, GitTimestamp } from './index-entry-utils';

export { GitIndex, IndexEntry, GitFileMode, GitTimestamp };
