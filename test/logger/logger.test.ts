import { afterEach, describe, test, expect, vi } from 'vitest';
import { ConsoleLogger, NULL_LOGGER, measureTime } from '../../src/logger';

afterEach(() => {
	vi.restoreAllMocks();
});

const silence = (method: 'error' | 'warn' | 'info' | 'debug' | 'trace') =>
	vi.spyOn(console, method).mockImplementation(() => undefined);

describe('ConsoleLogger', () => {
	test('logs messages at or above minLevel', () => {
		const errorSpy = silence('error');
		const warnSpy = silence('warn');
		const infoSpy = silence('info');

		const logger = new ConsoleLogger('warn');

		logger.error('Error message');
		logger.warn('Warn message');
		logger.info('Info message');

		expect(errorSpy).toHaveBeenCalledWith('[ERROR] Error message');
		expect(warnSpy).toHaveBeenCalledWith('[WARN] Warn message');
		expect(infoSpy).not.toHaveBeenCalled();
	});

	test('fatal goes to console.error', () => {
		const errorSpy = silence('error');
		new ConsoleLogger('fatal').fatal('Seed unreadable');
		expect(errorSpy).toHaveBeenCalledWith('[FATAL] Seed unreadable');
	});

	test('uses correct console method for each log level', () => {
		const errorSpy = silence('error');
		const warnSpy = silence('warn');
		const infoSpy = silence('info');
		const debugSpy = silence('debug');
		const traceSpy = silence('trace');

		const logger = new ConsoleLogger('trace');

		logger.error('Error');
		logger.warn('Warn');
		logger.info('Info');
		logger.debug('Debug');
		logger.trace('Trace');

		expect(errorSpy).toHaveBeenCalledWith('[ERROR] Error');
		expect(warnSpy).toHaveBeenCalledWith('[WARN] Warn');
		expect(infoSpy).toHaveBeenCalledWith('[INFO] Info');
		expect(debugSpy).toHaveBeenCalledWith('[DEBUG] Debug');
		expect(traceSpy).toHaveBeenCalledWith('[TRACE] Trace');
	});

	test('substitutes placeholders and passes the rest of the context', () => {
		const infoSpy = silence('info');
		const logger = new ConsoleLogger('info');

		logger.info('Signed bundle with {spends} spends', { spends: 2, cost: 42 });

		expect(infoSpy).toHaveBeenCalledWith('[INFO] Signed bundle with 2 spends', { cost: 42 });
	});

	test('leaves unknown placeholders untouched', () => {
		const infoSpy = silence('info');
		new ConsoleLogger('info').info('Coin {coinId}');
		expect(infoSpy).toHaveBeenCalledWith('[INFO] Coin {coinId}');
	});

	test('handles Error objects in context', () => {
		const errorSpy = silence('error');
		const logger = new ConsoleLogger('error');
		const err = new Error('Test error');

		logger.error('Error occurred', { error: err });

		expect(errorSpy).toHaveBeenCalledWith('[ERROR] Error occurred', {
			error: { message: 'Test error', stack: expect.any(String) },
		});
	});

	test('generic log method works correctly', () => {
		const infoSpy = silence('info');
		const debugSpy = silence('debug');
		const logger = new ConsoleLogger('info');

		logger.log('info', 'Info message');
		logger.log('debug', 'Debug message');

		expect(infoSpy).toHaveBeenCalledWith('[INFO] Info message');
		expect(debugSpy).not.toHaveBeenCalled();
	});
});

describe('NullLogger', () => {
	test('does not log anything', () => {
		const errorSpy = silence('error');

		NULL_LOGGER.error('Should not log');
		NULL_LOGGER.fatal('Should not log');

		expect(errorSpy).not.toHaveBeenCalled();
	});
});

describe('measureTime', () => {
	test('reports elapsed milliseconds', () => {
		vi.spyOn(Date, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1250);
		const timer = measureTime();
		expect(timer.elapsed()).toBe(250);
	});
});
