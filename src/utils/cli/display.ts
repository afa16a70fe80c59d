import boxen, { Options as BoxenOptions } from 'boxen';

/**
 * Standard boxen configuration used across all commands
 */
const DEFAULT_BOX_OPTIONS: Partial<BoxenOptions> = {
  padding: 1,
  margin: { top: 1, bottom: 1, left: 1, right: 1 },
  borderStyle: 'round',
  titleAlignment: 'center',
};

/**
 * Color themes for different types of displays
 */
export const DisplayThemes = {
  INFO: 'blue',
  SUCCESS: 'green',
  WARNING: 'yellow',
  ERROR: 'red',
  HIGHLIGHT: 'magenta',
} as const;

export type DisplayTheme = (typeof DisplayThemes)[keyof typeof DisplayThemes];

interface DisplayBoxOptions {
  title?: string;
  theme?: DisplayTheme;
}

/**
 * Creates a standardized boxen display with consistent styling
 */
export const createDisplayBox = (content: string, options: DisplayBoxOptions = {}): string => {
  const { theme = DisplayThemes.INFO, title } = options;

  const boxOptions: BoxenOptions = {
    ...DEFAULT_BOX_OPTIONS,
    borderColor: theme,
    ...(title === undefined ? {} : { title }),
  };

  return boxen(content, boxOptions);
};

/**
 * Displays a boxen on stderr, leaving stdout to the report lines
 */
export const displayBox = (content: string, options: DisplayBoxOptions = {}): void => {
  console.error(createDisplayBox(content, options));
};

/**
 * Pre-configured display functions for common use cases
 */
export const display = {
  /**
   * Display success message with green theme
   */
  success: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.SUCCESS, title }),

  /**
   * Display error message with red theme
   */
  error: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.ERROR, title }),

  /**
   * Display warning message with yellow theme
   */
  warning: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.WARNING, title }),

  /**
   * Display highlighted message with magenta theme
   */
  highlight: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.HIGHLIGHT, title }),
};
