import pino, { type Logger } from 'pino';

// diagnostics go to stderr so they never interleave with the menu on stdout
export function createLogger(level: string): Logger {
  return pino({ name: 'shop-cart', level }, pino.destination(2));
}
