/**
 * Terminal UI Type Definitions
 * Option and controller shapes used by utils/ui.
 */

export type SemanticColor =
  | 'success'
  | 'error'
  | 'warning'
  | 'info'
  | 'primary'
  | 'command'
  | 'path';

export interface BoxOptions {
  title?: string;
  padding?: number;
  margin?: number;
  borderColor?: string;
  borderStyle?: 'single' | 'double' | 'round' | 'bold' | 'classic';
}

export interface TableOptions {
  head?: string[];
}

export interface SpinnerController {
  fail(message?: string): void;
  stop(): void;
}
