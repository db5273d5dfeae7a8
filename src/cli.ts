/**
 * CLI Argument Parsing, Help and the replay command.
 */

import { createReadStream, existsSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { loadConfig } from './config/index.js';
import type { TimelineConfig } from './config/index.js';
import { TimelineController } from './timeline/timeline-controller.js';
import { TimelineEventAdapter } from './timeline/event-adapter.js';
import { TranscriptTimeline } from './timeline/transcript-timeline.js';
import { countCompletedTasks, type TaskPlanHost } from './timeline/task-plan.js';
import { getDebugLogPath } from './paths.js';
import {
  ConsoleSink,
  FileSink,
  configureLogger,
  createComponentLogger,
  isDebugEnv,
  type LogSink,
} from './utilities/logger.js';

// ANSI color codes for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
};

function c(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

export const VERSION = '0.1.0';

// =============================================================================
// ARGUMENTS
// =============================================================================

export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  command?: 'replay';
  eventsPath?: string;
  agentId?: string;
  configPath?: string;
  /** Problems found while parsing; non-empty means usage error */
  errors: string[];
}

export function parseArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = { help: false, version: false, debug: false, errors: [] };

  const takeValue = (flag: string, index: number): string | undefined => {
    const value = argv[index];
    if (value === undefined || value.startsWith('-')) {
      result.errors.push(`${flag} requires a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--agent' || arg === '-a') {
      result.agentId = takeValue(arg, i + 1);
      if (result.agentId !== undefined) i++;
    } else if (arg === '--config' || arg === '-c') {
      result.configPath = takeValue(arg, i + 1);
      if (result.configPath !== undefined) i++;
    } else if (arg.startsWith('-')) {
      result.errors.push(`unknown option: ${arg}`);
    } else if (result.command === undefined) {
      if (arg === 'replay') {
        result.command = 'replay';
      } else {
        result.errors.push(`unknown command: ${arg}`);
      }
    } else if (result.eventsPath === undefined) {
      result.eventsPath = arg;
    } else {
      result.errors.push(`unexpected argument: ${arg}`);
    }
  }

  if (result.command === 'replay' && result.eventsPath === undefined && !result.help) {
    result.errors.push('replay requires an events file');
  }

  return result;
}

export function helpText(): string {
  return `
${c('agent-timeline', 'bold')} ${VERSION}
Assemble an agent's event stream into a round-partitioned timeline.

${c('USAGE:', 'bold')}
  agent-timeline replay <events.jsonl> [OPTIONS]

${c('OPTIONS:', 'bold')}
  -a, --agent ID          Only replay events from this agent
  -c, --config PATH       Read configuration from PATH only
  --debug                 Debug logging to stderr and the debug log
  -h, --help              Show this help
  -v, --version           Show version (${VERSION})

${c('EXAMPLES:', 'bold')}
  ${c('# Print the transcript of one agent', 'dim')}
  agent-timeline replay logs/events.jsonl --agent agent_a
`;
}

// =============================================================================
// LOGGING SETUP
// =============================================================================

/**
 * Configure the global logger from config and flags. Debug mode (flag or
 * environment) lowers the level and adds the debug log file.
 */
export function setupLogging(config: TimelineConfig, debug: boolean): void {
  const debugMode = debug || isDebugEnv();
  const sinks: LogSink[] = [new ConsoleSink()];

  const filePath = config.logging.file ?? (debugMode ? getDebugLogPath() : undefined);
  if (filePath) {
    sinks.push(new FileSink(filePath));
  }

  configureLogger({ level: debugMode ? 'debug' : config.logging.level, sinks });
}

// =============================================================================
// REPLAY
// =============================================================================

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const defaultIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

/** Prints task plan changes into the transcript stream */
function transcriptTaskPlanHost(io: CliIO): TaskPlanHost {
  return {
    updateTaskPlan(agentId, update) {
      const done = countCompletedTasks(update.tasks);
      io.out(`task plan ${update.operation} agent=${agentId} tasks=${done}/${update.tasks.length}\n`);
    },
  };
}

/**
 * Replay an events file and print its transcript. Returns the exit code.
 */
export async function runReplay(
  options: { eventsPath: string; agentId?: string; config: TimelineConfig },
  io: CliIO = defaultIO,
): Promise<number> {
  const log = createComponentLogger('cli');

  if (!existsSync(options.eventsPath)) {
    io.err(`${c('error:', 'red')} events file not found: ${options.eventsPath}\n`);
    return 2;
  }

  const timeline = new TranscriptTimeline({ write: (line) => io.out(line + '\n') });
  const controller = new TimelineController({
    agentId: options.agentId ?? 'agent',
    getTimeline: () => timeline,
    config: options.config,
    taskPlanHost: transcriptTaskPlanHost(io),
  });
  const adapter = new TimelineEventAdapter({ controller, agentId: options.agentId });

  const lines = createInterface({ input: createReadStream(options.eventsPath, 'utf-8'), crlfDelay: Infinity });
  let lineNumber = 0;
  for await (const line of lines) {
    lineNumber++;
    adapter.processLine(line, lineNumber);
  }
  adapter.flush();

  const stats = adapter.getStats();
  log.info('Replay finished', { ...stats, lines: lineNumber });
  return stats.invalid > 0 && stats.processed === 0 ? 1 : 0;
}

/**
 * Entry point shared by the binary: parse, configure, dispatch.
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  const args = parseArgs(argv);

  if (args.version) {
    io.out(`${VERSION}\n`);
    return 0;
  }
  if (args.help) {
    io.out(helpText());
    return 0;
  }
  if (args.errors.length > 0) {
    for (const message of args.errors) {
      io.err(`${c('error:', 'red')} ${message}\n`);
    }
    return 2;
  }
  if (args.command === undefined) {
    io.out(helpText());
    return 0;
  }

  const loaded = loadConfig(args.configPath ? { configPath: args.configPath } : {});
  setupLogging(loaded.resolved, args.debug);

  const log = createComponentLogger('cli');
  for (const warning of loaded.warnings) {
    log.warn(warning);
  }

  const eventsPath = args.eventsPath;
  if (eventsPath === undefined) {
    return 2;
  }
  return runReplay({ eventsPath, agentId: args.agentId, config: loaded.resolved }, io);
}
