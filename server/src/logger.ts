import fs from 'node:fs';
import path from 'node:path';

type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

const logsDir = process.env.LOG_DIR
  ? path.resolve(process.env.LOG_DIR)
  : path.join(process.cwd(), 'logs');

// never under Jest, whatever LOG_TO_FILE says
const fileLoggingEnabled =
  process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false';

if (fileLoggingEnabled && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

const logFile = path.join(
  logsDir,
  `server-${new Date().toISOString().split('T')[0]}.log`
);

export function formatLogMessage(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = new Date().toISOString();
  const formattedArgs = args
    .map((arg) => {
      if (arg instanceof Error) {
        return arg.stack ?? `${arg.name}: ${arg.message}`;
      }
      if (typeof arg === 'object' && arg !== null) {
        return JSON.stringify(arg, null, 2);
      }
      return String(arg);
    })
    .join(' ');

  return `[${timestamp}] [${level}] ${message} ${formattedArgs}\n`;
}

function writeToFile(message: string) {
  if (!fileLoggingEnabled) return;
  fs.appendFileSync(logFile, message, 'utf8');
}

export const logger = {
  log: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('INFO', message, ...args);
    console.log(message, ...args);
    writeToFile(formatted);
  },

  error: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('ERROR', message, ...args);
    console.error(message, ...args);
    writeToFile(formatted);
  },

  warn: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('WARN', message, ...args);
    console.warn(message, ...args);
    writeToFile(formatted);
  },

  debug: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('DEBUG', message, ...args);
    console.log(message, ...args);
    writeToFile(formatted);
  },

  getLogFilePath: () => (fileLoggingEnabled ? logFile : null),
};

export type Logger = typeof logger;
