import { type Logger, type LogLevel } from './Logger';

const LEVEL_ORDER: Record<LogLevel, number> = {
	fatal: 0,
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
	trace: 5,
};

/**
 * Outputs messages to the console based on the specified log level.
 *
 * Placeholders in the message (e.g. `{coinId}`) are replaced with values from `context`; the
 * remaining context keys are passed to the console as a second argument. Each line is prefixed
 * with the level in square brackets.
 *
 * @example
 *
 * ```ts
 * const logger = new ConsoleLogger('debug');
 * logger.info('Signed coin {coinId}', { coinId: '0xab', index: 3 });
 * // [INFO] Signed coin 0xab { index: 3 }
 * ```
 */
export class ConsoleLogger implements Logger {
	private minLevel: LogLevel;

	constructor(minLevel: LogLevel = 'info') {
		this.minLevel = minLevel;
	}

	private should(level: LogLevel): boolean {
		return LEVEL_ORDER[level] <= LEVEL_ORDER[this.minLevel];
	}
	// Not static: tests spy on console methods after construction
	private method(level: LogLevel): (msg: string, ...rest: unknown[]) => void {
		switch (level) {
			case 'fatal':
			case 'error':
				return console.error;
			case 'warn':
				return console.warn;
			case 'info':
				return console.info;
			case 'debug':
				return console.debug;
			case 'trace':
				return console.trace;
			default:
				return console.log;
		}
	}
	private flattenContext(ctx?: Record<string, unknown>): Record<string, unknown> {
		const out: Record<string, unknown> = {};
		if (!ctx) return out;
		for (const [k, v] of Object.entries(ctx)) {
			out[k] = v instanceof Error ? { message: v.message, stack: v.stack } : v;
		}
		return out;
	}
	private emit(level: LogLevel, message: string, context?: Record<string, unknown>) {
		if (!this.should(level)) return;
		const ctx = this.flattenContext(context);
		const used = new Set<string>();
		const text = message.replace(/\{(\w+)\}/g, (match, key: string) => {
			if (ctx[key] === undefined) return match;
			used.add(key);
			return String(ctx[key]);
		});
		const rest = Object.fromEntries(Object.entries(ctx).filter(([k]) => !used.has(k)));
		const line = `[${level.toUpperCase()}] ${text}`;
		const fn = this.method(level);
		if (Object.keys(rest).length) fn(line, rest);
		else fn(line);
	}

	fatal(msg: string, ctx?: Record<string, unknown>) {
		this.emit('fatal', msg, ctx);
	}
	error(msg: string, ctx?: Record<string, unknown>) {
		this.emit('error', msg, ctx);
	}
	warn(msg: string, ctx?: Record<string, unknown>) {
		this.emit('warn', msg, ctx);
	}
	info(msg: string, ctx?: Record<string, unknown>) {
		this.emit('info', msg, ctx);
	}
	debug(msg: string, ctx?: Record<string, unknown>) {
		this.emit('debug', msg, ctx);
	}
	trace(msg: string, ctx?: Record<string, unknown>) {
		this.emit('trace', msg, ctx);
	}

	log(level: LogLevel, message: string, context?: Record<string, unknown>) {
		this.emit(level, message, context);
	}
}

/**
 * Creates a timer to measure elapsed time in milliseconds.
 *
 * @example
 *
 * ```ts
 * const timer = measureTime();
 * // ... derive and sign ...
 * logger.debug('signed bundle', { ms: timer.elapsed() });
 * ```
 */
export function measureTime() {
	const start = Date.now();
	return {
		elapsed: () => {
			return Date.now() - start;
		},
	};
}
