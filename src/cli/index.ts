#!/usr/bin/env node
/**
 * Gate Maze Solver - CLI Interface
 */

import * as fs from 'node:fs';
import * as readline from 'node:readline';

import { isMazeError } from '../domain/errors.js';
import { Level, createLevel, parseLevelFromJSON } from '../io/level-parser.js';
import { parseBoardText } from '../io/board-text.js';
import { formatEvent, formatSolution, formatSolutionJSON } from '../io/solution-formatter.js';
import { MazeSolver, analyzeLevel } from '../solver/solver.js';
import { Game } from '../engine/game.js';
import { SessionStore, SessionStepResult } from '../session/session-store.js';

// Parse command line arguments
const args = process.argv.slice(2);

interface CLIOptions {
  command: 'solve' | 'analyze' | 'play' | 'interactive' | 'help';
  inputFile?: string;
  outputFormat: 'text' | 'json';
  maxExpansions?: number;
  micro: boolean;
  actions: string[];
}

function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    outputFormat: 'text',
    micro: false,
    actions: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case 'solve':
      case 'analyze':
      case 'play':
      case 'interactive':
        options.command = arg;
        break;

      case '-i':
      case '--input':
        options.inputFile = args[++i];
        break;

      case '-f':
      case '--format':
        options.outputFormat = args[++i] === 'json' ? 'json' : 'text';
        break;

      case '-b':
      case '--budget':
        options.maxExpansions = parseInt(args[++i], 10);
        if (!Number.isInteger(options.maxExpansions) || options.maxExpansions < 0) {
          throw new Error('--budget expects a non-negative integer');
        }
        break;

      case '-m':
      case '--micro':
        options.micro = true;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;

      default:
        // Remaining positional arguments are actions for `play`
        options.actions.push(arg);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
Gate Maze Solver
================

Simulates and solves grid mazes with gates, keys, traps and pursuers.

USAGE:
  gate-maze <command> [options] [actions...]

COMMANDS:
  solve         Find a shortest winning action sequence
  analyze       Summarise a level without solving it
  play          Apply a sequence of actions and print each resulting board
  interactive   Play step by step from the terminal
  help          Show this help message

OPTIONS:
  -i, --input <file>      Level file: .json description or text board
  -f, --format <type>     Output format: text (default) or json
  -b, --budget <n>        Maximum node expansions for the solver (default: 200000)
  -m, --micro             Advance one phase per action (play, interactive)
  -h, --help              Show help

EXAMPLES:
  gate-maze solve -i level.txt
  gate-maze solve -i level.json --budget 50000 --format json
  gate-maze play -i level.txt RIGHT RIGHT WAIT
  gate-maze interactive -i level.txt

TEXT BOARD FORMAT:
  +-+-+-+-+
  |P.K:..E|
  +-+-+-+-+

  P explorer, E exit, T trap, K key, H/V fast pursuers, S slow pursuer
  - | walls, = : closed gates, ~ ; open gates
`);
}

function loadLevel(options: CLIOptions): Level {
  if (!options.inputFile) {
    throw new Error('Must provide a level with --input <file>');
  }

  const content = fs.readFileSync(options.inputFile, 'utf-8');
  if (options.inputFile.endsWith('.json')) {
    return parseLevelFromJSON(content);
  }
  return createLevel(parseBoardText(content));
}

function runSolve(options: CLIOptions): number {
  const level = loadLevel(options);
  const solver = new MazeSolver();
  const solution = solver.solveLevel(
    level,
    options.maxExpansions === undefined ? {} : { maxExpansions: options.maxExpansions }
  );

  if (options.outputFormat === 'json') {
    console.log(formatSolutionJSON(solution));
  } else {
    console.log('Initial State:');
    console.log(new Game(level).toText());
    console.log('');
    console.log(formatSolution(solution));
  }

  return solution.found ? 0 : 1;
}

function runAnalyze(options: CLIOptions): number {
  const level = loadLevel(options);
  const analysis = analyzeLevel(level);

  if (options.outputFormat === 'json') {
    console.log(JSON.stringify(analysis, null, 2));
    return 0;
  }

  console.log('=== LEVEL ANALYSIS ===');
  console.log('');
  console.log(new Game(level).toText());
  console.log('');
  console.log(`Size: ${analysis.rows}x${analysis.cols}`);
  console.log(`Gates: ${analysis.gates} (${analysis.openGates} open)`);
  console.log(`Traps: ${analysis.traps}  Keys: ${analysis.keys}`);
  console.log('Pursuers:');
  for (const [type, count] of Object.entries(analysis.pursuerCounts)) {
    console.log(`  ${type}: ${count}`);
  }
  console.log(`Distance to exit: ${analysis.exitDistance ?? 'n/a'}`);
  console.log(`Opening actions: ${analysis.availableActions.join(', ')}`);

  if (analysis.suggestions.length > 0) {
    console.log('');
    console.log('Suggestions:');
    for (const suggestion of analysis.suggestions) {
      console.log(`  • ${suggestion}`);
    }
  }

  return 0;
}

function runPlay(options: CLIOptions): number {
  const level = loadLevel(options);
  const store = new SessionStore();
  const session = store.start(level);

  for (const action of options.actions) {
    const result = options.micro ? store.stepMicro(session.id, action) : store.step(session.id, action);
    console.log('');
    console.log(`=== ${result.action} ===`);
    console.log(session.game.toText());
    printResult(result);
    if (result.done) break;
  }

  const summary = {
    position: session.game.state.explorer,
    done: session.game.isDone || session.drawn,
    status: session.game.gameStatus,
    turns: session.game.turnCount,
  };
  console.log('');
  console.log('# summary:');
  console.log(JSON.stringify(summary, null, 2));

  return 0;
}

function printResult(result: SessionStepResult): void {
  for (const event of result.events) {
    console.log(`  - ${formatEvent(event)}`);
  }
  if (result.reason) {
    console.log(`# reason: ${result.reason}`);
  }
  if (result.done) {
    console.log(`# game over: ${result.outcome ?? 'unknown'}${result.won ? ' (won)' : ''}`);
  }
}

async function runInteractive(options: CLIOptions): Promise<number> {
  const level = loadLevel(options);
  const store = new SessionStore();
  const session = store.start(level);
  const solver = new MazeSolver(
    options.maxExpansions === undefined ? {} : { maxExpansions: options.maxExpansions }
  );
  let micro = options.micro;

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const question = (prompt: string): Promise<string> => {
    return new Promise((resolve) => {
      rl.question(prompt, resolve);
    });
  };

  console.log('=== Gate Maze - Interactive Mode ===');
  console.log('');
  console.log('Actions: up, down, left, right, wait, undo, reset');
  console.log('Commands: hint, micro, show, quit');
  console.log('');

  let running = true;

  while (running) {
    console.log(session.game.toText());
    const phase = session.game.currentPhase;
    console.log(micro ? `[phase: ${phase}]` : '');

    const input = (await question('> ')).trim().toLowerCase();

    switch (input) {
      case 'quit':
      case 'exit':
      case 'q':
        running = false;
        break;

      case 'show':
        break;

      case 'micro':
        micro = !micro;
        console.log(`Micro stepping ${micro ? 'on' : 'off'}`);
        break;

      case 'hint': {
        const solution = solver.solve(session.game.topology, session.game.state);
        console.log(
          solution.found
            ? `Plan: ${solution.actions.join(' ') || '(already at exit)'}`
            : `No plan (${solution.reason})`
        );
        break;
      }

      default: {
        const result = micro ? store.stepMicro(session.id, input) : store.step(session.id, input);
        printResult(result);
        console.log(`moves=${result.turn} repeats=${result.repeatCount}`);
      }
    }

    console.log('');
  }

  rl.close();
  console.log('Goodbye!');
  return 0;
}

// Main entry point
async function main(): Promise<number> {
  const options = parseArgs(args);

  switch (options.command) {
    case 'solve':
      return runSolve(options);

    case 'analyze':
      return runAnalyze(options);

    case 'play':
      return runPlay(options);

    case 'interactive':
      return runInteractive(options);

    case 'help':
    default:
      printHelp();
      return 0;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (isMazeError(err)) {
      console.error(`Error [${err.code}]: ${err.message}`);
    } else {
      console.error('Error:', err);
    }
    process.exit(1);
  });
