import winston from 'winston';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel | 'silent' {
  const value = (raw || 'info').toLowerCase();
  if (value === 'silent') return 'silent';
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

const level = resolveLevel(process.env.LOG_LEVEL);

export const logger = winston.createLogger({
  level: level === 'silent' ? 'error' : level,
  silent: level === 'silent',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(info => {
      const { timestamp, level: infoLevel, message, stack } = info;
      const line = `${String(timestamp)} ${infoLevel.toUpperCase().padEnd(5)} ${String(message)}`;
      return typeof stack === 'string' ? `${line}\n${stack}` : line;
    })
  ),
  transports: [new winston.transports.Console()],
});
