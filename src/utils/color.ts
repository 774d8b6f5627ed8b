import chalk, { Chalk, type ChalkInstance } from 'chalk';

/**
 * The chalk instance for a command: the shared one, or a colourless one
 * when `--no-color` is set.
 */
export function createPaint(noColor: boolean): ChalkInstance {
  return noColor ? new Chalk({ level: 0 }) : chalk;
}
