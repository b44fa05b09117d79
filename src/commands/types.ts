// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Rotation and runtime overrides shared by 'serve' and 'client'
 */
export interface RotationCommandOptions {
  rotateInterval?: number;
  jitter?: number;
  minGap?: number;
  keepGapOnFailure?: boolean;
  rotationLog?: string;
  tick?: number;
  strategyTimeout?: number;
  surface?: string;
  verbose?: boolean;
}

/**
 * Options for the 'serve' command
 */
export interface ServeCommandOptions extends RotationCommandOptions {
  connections?: number;
  autoClose?: number;
  /** false with --no-console */
  console?: boolean;
  validate?: boolean;
}

/**
 * Options for the 'client' command
 */
export interface ClientCommandOptions extends RotationCommandOptions {
  duration?: number;
}

/**
 * Options for the 'analyze' command
 */
export interface AnalyzeCommandOptions {
  rotationLog: string;
  last?: number;
  json?: boolean;
}

/**
 * Options for the 'config show' command
 */
export interface ConfigShowCommandOptions {
  json?: boolean;
}

/**
 * Options for the 'config init' command
 */
export interface ConfigInitCommandOptions {
  force?: boolean;
}
