import { formatHelp, displayVersion, displayError, packageInfo } from './cli-display';
import { display } from './display';

export { formatHelp, displayVersion, displayError, packageInfo, display };
