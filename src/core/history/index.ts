export { CommitGraph } from './commit-graph';
