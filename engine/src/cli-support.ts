import { config } from './utils/config.js';
import type { SessionSummary } from './workflow/monitor.js';
import { AUTOSAVE_SLOT } from './workflow/runner.js';
import type { EngineEvent, WorldState } from './workflow/types.js';

export interface CliOptions {
  workflow?: string;
  resume: boolean;
  slot: string;
  workflowsFile: string;
  promptsFile: string;
  providersFile: string;
  savesDir: string;
  filesDir: string;
  list: boolean;
  help: boolean;
  /** Initial world attributes from `--set key=value`. */
  world: WorldState;
}

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    resume: false,
    slot: AUTOSAVE_SLOT,
    workflowsFile: config.paths.workflowsFile,
    promptsFile: config.paths.promptsFile,
    providersFile: config.paths.providersFile,
    savesDir: config.paths.savesDir,
    filesDir: config.paths.filesDir,
    list: false,
    help: false,
    world: {},
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const value = (): string => {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`Missing value for ${arg}`);
      }
      i += 1;
      return next;
    };

    switch (arg) {
      case '--resume':
        options.resume = true;
        if (args[i + 1] !== undefined && !args[i + 1].startsWith('--')) {
          options.slot = value();
        }
        break;
      case '--slot':
        options.slot = value();
        break;
      case '--workflows':
        options.workflowsFile = value();
        break;
      case '--prompts':
        options.promptsFile = value();
        break;
      case '--providers':
        options.providersFile = value();
        break;
      case '--saves':
        options.savesDir = value();
        break;
      case '--files':
        options.filesDir = value();
        break;
      case '--set': {
        const pair = value();
        const separator = pair.indexOf('=');
        if (separator <= 0) {
          throw new Error(`Expected key=value after --set, got '${pair}'`);
        }
        options.world[pair.slice(0, separator)] = pair.slice(separator + 1);
        break;
      }
      case '--list':
        options.list = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('--') || options.workflow !== undefined) {
          throw new Error(`Unexpected argument: ${arg}`);
        }
        options.workflow = arg;
    }
  }

  return options;
}

export const USAGE = `
story-flow - run an interactive story workflow

Usage:
  story-flow <workflow id or name>          # Start a new session
  story-flow <workflow> --resume [slot]     # Resume a saved session (default slot: ${AUTOSAVE_SLOT})
  story-flow --list                         # List workflows in the workflow file

Options:
  --slot <name>        Save slot written on Ctrl+C
  --set <key=value>    Initial world attribute, repeatable
  --workflows <file>   Workflow document (default: ${config.paths.workflowsFile})
  --prompts <file>     Prompt library (default: ${config.paths.promptsFile})
  --providers <file>   Provider settings (default: ${config.paths.providersFile})
  --saves <dir>        Save directory (default: ${config.paths.savesDir})
  --files <dir>        Step reference and output files (default: ${config.paths.filesDir})

Environment Variables:
  MODEL_BASE_URL, MODEL_API_KEY, MODEL_NAME   # Default provider
  LOG_LEVEL                                   # debug | info | warn | error | silent
`;

export function formatEvent(event: EngineEvent): string | null {
  switch (event.type) {
    case 'node_entered':
      return `\n== ${event.nodeId} (pass ${event.iteration}, ${event.progress}%) ==`;
    case 'step_completed':
      return `\n${event.text}\n`;
    case 'loop_bound_exceeded':
      return `[${event.scope} '${event.id}' stopped after ${event.maxIterations} iterations]`;
    case 'suspended':
      return '\n[session suspended]';
    case 'completed':
      return '\n[the end]';
    case 'failed':
      return `\n[session failed] ${event.reason}`;
    default:
      return null;
  }
}

export function formatSummary(summary: SessionSummary): string {
  const lines = [
    `Status:          ${summary.status}`,
    `Nodes entered:   ${summary.nodesEntered}`,
    `Replies:         ${summary.replies}`,
    `Loop iterations: ${summary.loopIterations.node} node, ${summary.loopIterations.step} step`,
  ];
  if (summary.boundWarnings > 0) {
    lines.push(`Loops cut off:   ${summary.boundWarnings}`);
  }
  if (summary.duration !== undefined) {
    lines.push(`Duration:        ${(summary.duration / 1000).toFixed(1)}s`);
  }
  return lines.join('\n');
}
