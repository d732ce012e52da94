/**
 * A* Search Algorithm for maze solving
 *
 * Nodes are canonical world states; an edge is one explorer action followed
 * by the full pursuer response, at cost 1.
 */

import { MoveAction, SearchStats, Solution, SolutionStep, SolverOptions } from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';
import { Topology, isExit } from '../board/topology.js';
import { WorldState } from '../state/world-state.js';
import { canonicalKey } from '../state/state-hash.js';
import { SearchNode, PriorityQueue, createSearchNode, extractActionPath } from './search-node.js';
import { distanceToExit } from './heuristics.js';
import { generateSuccessors } from './action-generator.js';

/**
 * A* Search implementation for maze solving
 */
export function astarSolve(
  topology: Topology,
  initialWorld: WorldState,
  options: Partial<SolverOptions> = {}
): Solution {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  const startTime = Date.now();

  let nodesExpanded = 0;
  let nodesGenerated = 0;
  const stats = (): SearchStats => ({ nodesExpanded, nodesGenerated, timeTaken: Date.now() - startTime });

  if (isExit(topology, initialWorld.explorer)) {
    return { found: true, actions: [], steps: [], stats: stats() };
  }

  const openSet = new PriorityQueue<SearchNode>();
  const bestCost = new Map<string, number>();

  // Initial node
  const startNode = createSearchNode(
    initialWorld,
    canonicalKey(initialWorld),
    null,
    null,
    0,
    distanceToExit(topology, initialWorld.explorer)
  );
  bestCost.set(startNode.key, 0);
  openSet.push(startNode);

  while (!openSet.isEmpty()) {
    const current = openSet.pop();
    if (current === undefined) break;

    // Skip entries superseded by a cheaper path
    if (current.cost !== bestCost.get(current.key)) continue;

    // Check expansion budget
    if (nodesExpanded >= opts.maxExpansions) {
      return { found: false, reason: 'budget_exceeded', stats: stats() };
    }
    nodesExpanded++;

    for (const successor of generateSuccessors(topology, current.world)) {
      nodesGenerated++;

      if (successor.kind === 'win') {
        const actions = [...extractActionPath(current), successor.action];
        const steps = buildSteps(current, successor.action, successor.destination);
        return { found: true, actions, steps, stats: stats() };
      }

      const key = canonicalKey(successor.world);
      const cost = current.cost + 1;
      if (cost >= (bestCost.get(key) ?? Infinity)) continue;

      bestCost.set(key, cost);
      openSet.push(
        createSearchNode(
          successor.world,
          key,
          current,
          successor.action,
          cost,
          distanceToExit(topology, successor.world.explorer)
        )
      );
    }
  }

  return { found: false, reason: 'no_solution', stats: stats() };
}

/**
 * Convert the node chain plus the winning action to numbered steps
 */
function buildSteps(node: SearchNode, finalAction: MoveAction, finalPosition: SolutionStep['position']): SolutionStep[] {
  const chain: SearchNode[] = [];
  for (let current: SearchNode | null = node; current !== null; current = current.parent) {
    if (current.action !== null) chain.unshift(current);
  }

  const steps: SolutionStep[] = chain.map((n, i) => ({
    stepNumber: i + 1,
    action: n.action ?? 'WAIT',
    position: n.world.explorer,
  }));
  steps.push({ stepNumber: steps.length + 1, action: finalAction, position: finalPosition });

  return steps;
}
