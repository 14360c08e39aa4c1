import { EventEmitter } from 'node:events';

export type LogMode = 'ci' | 'cli' | 'ui';

export type LogFormat = 'jsonl' | 'pretty';

export type LogEvent =
  | {
      event: 'startup';
      mode: LogMode;
      host: string;
      port: number;
      sourceDir?: string;
      pauseMs: number;
      scenarios: string[];
    }
  | {
      event: 'startup-failed';
      message: string;
    }
  | {
      event: 'config-files';
      files: string[];
    }
  | {
      event: 'validation-file';
      file: string;
      result: 'ok' | 'failed';
      errors?: Array<{
        path: string;
        message: string;
        severity: 'error' | 'warning';
        line?: number;
        column?: number;
      }>;
    }
  | {
      event: 'validation-summary';
      errors: number;
      warnings: number;
    }
  | {
      event: 'scenarios-discovered';
      scenarios: string[];
    }
  | {
      event: 'scenario-start';
      scenarioId: string;
      description: string;
      index: number;
      total: number;
    }
  | {
      event: 'request-sent';
      scenarioId: string;
      bytes: number;
      text: string;
    }
  | {
      event: 'response-received';
      scenarioId: string;
      termination: 'closed' | 'timeout';
      bytes: number;
      status?: number;
      text: string;
    }
  | {
      event: 'scenario-failed';
      scenarioId: string;
      stage: 'build' | 'connect' | 'io';
      code?: string;
      message: string;
      // Set when bytes arrived before the failure.
      bytes?: number;
      status?: number;
      text?: string;
    }
  | {
      event: 'run-complete';
      total: number;
      responded: number;
      failed: number;
      uploads: number;
    };

export type EventLogger = {
  emitEvent: (event: LogEvent) => void;
  onEvent: (handler: (event: LogEvent) => void) => void;
};

export type EventLoggerOptions = {
  mode: LogMode;
  format?: LogFormat;
  stream?: NodeJS.WritableStream;
};

const RULE = '-'.repeat(60);
const BANNER = '='.repeat(60);

const stableStringify = (value: unknown): string => {
  if (value === undefined) {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));

  const body = entries
    .map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`)
    .join(',');
  return `{${body}}`;
};

export const createEventLogger = ({ mode, stream, format }: EventLoggerOptions): EventLogger => {
  const emitter = new EventEmitter();
  const output = stream ?? (mode === 'ui' ? process.stderr : process.stdout);
  const activeFormat = format ?? (mode === 'ci' ? 'jsonl' : stream ? 'jsonl' : 'pretty');

  const colors = {
    reset: '\u001b[0m',
    green: '\u001b[32m',
    red: '\u001b[31m',
    lightBlue: '\u001b[94m',
  };

  const colorizeLine = (line: string): string => {
    if (activeFormat !== 'pretty' || mode === 'ci') {
      return line;
    }

    if (line.startsWith('✔')) {
      return `${colors.green}${line}${colors.reset}`;
    }

    if (line.startsWith('✖')) {
      return `${colors.red}${line}${colors.reset}`;
    }

    if (line.startsWith('▶') || line.startsWith('○')) {
      return `${colors.lightBlue}${line}${colors.reset}`;
    }

    return line;
  };

  // Wire text is printed untouched between rules, never colourized.
  const withPayload = (lines: string[], text: string): string => {
    return [...lines.map(colorizeLine), RULE, text, RULE].join('\n');
  };

  const formatPretty = (event: LogEvent): string => {
    switch (event.event) {
      case 'startup':
        return [
          '▶ Startup',
          ` ○ mode=${event.mode}`,
          ` ○ target=${event.host}:${event.port}`,
          ` ○ source=${event.sourceDir ?? 'none'}`,
          ` ○ pauseMs=${event.pauseMs}`,
          ` ○ scenarios=${event.scenarios.length}`,
        ].map(colorizeLine).join('\n');
      case 'startup-failed':
        return [
          '✖ Startup failed',
          ` ○ message=${event.message}`,
        ].map(colorizeLine).join('\n');
      case 'config-files':
        return [
          '▶ Config files',
          ` ○ count=${event.files.length}`,
        ].map(colorizeLine).join('\n');
      case 'validation-file':
        return [
          `${event.result === 'ok' ? '✔' : '✖'} Validation file`,
          ` ○ file=${event.file}`,
          ` ○ result=${event.result}`,
        ].map(colorizeLine).join('\n');
      case 'validation-summary':
        return [
          '▶ Validation summary',
          ` ○ errors=${event.errors}`,
          ` ○ warnings=${event.warnings}`,
        ].map(colorizeLine).join('\n');
      case 'scenarios-discovered':
        return [
          '▶ Scenarios discovered',
          ` ○ count=${event.scenarios.length}`,
        ].map(colorizeLine).join('\n');
      case 'scenario-start':
        return [
          `\n${BANNER}`,
          `Test ${event.index + 1}/${event.total}: ${event.description}`,
          BANNER,
          ...[`▶ Scenario`, ` ○ id=${event.scenarioId}`].map(colorizeLine),
        ].join('\n');
      case 'request-sent':
        return withPayload(
          ['▶ Sending request', ` ○ bytes=${event.bytes}`],
          event.text
        );
      case 'response-received':
        return withPayload(
          [
            '✔ Received response',
            ` ○ termination=${event.termination}`,
            ` ○ bytes=${event.bytes}`,
            ` ○ status=${event.status ?? 'none'}`,
          ],
          event.text
        );
      case 'scenario-failed': {
        const lines = [
          '✖ Scenario failed',
          ` ○ id=${event.scenarioId}`,
          ` ○ stage=${event.stage}`,
          ` ○ code=${event.code ?? 'none'}`,
          ` ○ message=${event.message}`,
        ];
        if (event.text === undefined) {
          return lines.map(colorizeLine).join('\n');
        }
        return withPayload(
          [...lines, ` ○ bytes=${event.bytes ?? 0}`, ` ○ status=${event.status ?? 'none'}`],
          event.text
        );
      }
      case 'run-complete':
        return [
          `\n${BANNER}`,
          ...[
            '▶ All tests completed',
            ` ○ total=${event.total}`,
            ` ○ responded=${event.responded}`,
            ` ○ failed=${event.failed}`,
          ].map(colorizeLine),
          ...(event.uploads > 0 ? ["Check the server's upload directory for the uploaded files"] : []),
          BANNER,
        ].join('\n');
      default:
        return stableStringify(event);
    }
  };

  const emitEvent = (event: LogEvent) => {
    emitter.emit('event', event);
    const line = activeFormat === 'jsonl' ? stableStringify(event) : formatPretty(event);
    output.write(`${line}\n`);
  };

  const onEvent = (handler: (event: LogEvent) => void) => {
    emitter.on('event', handler);
  };

  return { emitEvent, onEvent };
};

export const createNullEventLogger = (): EventLogger => {
  return {
    emitEvent: () => undefined,
    onEvent: () => undefined,
  };
};
