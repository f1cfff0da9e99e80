import pino from 'pino';

// stdout carries the MCP protocol, so every log line goes to stderr.
const STDERR = 2;

export function createLogger(name: string, level = 'info') {
  if (process.env.NODE_ENV !== 'production') {
    return pino({
      name,
      level,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: STDERR } },
    });
  }
  return pino({ name, level }, pino.destination(STDERR));
}

export type Logger = pino.Logger;
