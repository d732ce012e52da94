/**
 * Format solutions and game events for human-readable output
 */

import { GameEvent, Solution, SolutionStep, formatCoord } from '../domain/types.js';

/**
 * Format a complete solution for console output
 */
export function formatSolution(solution: Solution): string {
  const lines: string[] = [];

  lines.push('=== MAZE SOLUTION ===');
  lines.push('');

  if (solution.found) {
    lines.push(`Solution in ${solution.actions.length} move${solution.actions.length === 1 ? '' : 's'}:`);
    for (const step of solution.steps) {
      lines.push(formatStep(step));
    }
  } else if (solution.reason === 'budget_exceeded') {
    lines.push('No solution found within the expansion budget.');
  } else {
    lines.push('No solution exists: every reachable state was explored.');
  }
  lines.push('');

  // Search stats
  lines.push('=== SEARCH STATISTICS ===');
  lines.push(`Nodes Expanded: ${solution.stats.nodesExpanded.toLocaleString('en-US')}`);
  lines.push(`Nodes Generated: ${solution.stats.nodesGenerated.toLocaleString('en-US')}`);
  lines.push(`Time Taken: ${solution.stats.timeTaken}ms`);

  return lines.join('\n');
}

/**
 * Format a single solution step
 */
export function formatStep(step: SolutionStep): string {
  return `${String(step.stepNumber).padStart(3)}. ${step.action.padEnd(5)} -> ${formatCoord(step.position)}`;
}

/**
 * Format a solution as JSON
 */
export function formatSolutionJSON(solution: Solution): string {
  return JSON.stringify(solution, null, 2);
}

/**
 * One-line description of a game event
 */
export function formatEvent(event: GameEvent): string {
  switch (event.type) {
    case 'move':
      return `${event.entity} moves ${formatCoord(event.from)} -> ${formatCoord(event.to)}`;
    case 'collision':
      return `${event.winner} crushes ${event.loser} at ${formatCoord(event.at)}`;
    case 'toggle_gates':
      return `${event.by} steps on key at ${formatCoord(event.at)}; ${event.open} gate(s) now open`;
    case 'trap':
      return `explorer falls into trap at ${formatCoord(event.at)}`;
    case 'exit':
      return `explorer escapes at ${formatCoord(event.at)}`;
    case 'capture':
      return `${event.by} captures the explorer at ${formatCoord(event.at)}`;
  }
}
