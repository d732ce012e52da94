/**
 * Shared test fixtures
 */

import { Level, createLevel } from '../src/io/level-parser.js';
import { parseBoardText } from '../src/io/board-text.js';

/**
 * Build a level from board text lines
 */
export function boardLevel(...lines: string[]): Level {
  return createLevel(parseBoardText(lines.join('\n')));
}
