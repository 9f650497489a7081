import { afterEach, describe, expect, it, vi } from 'vitest';

import { consoleLogger } from './logger.js';

describe('consoleLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should drop debug lines by default', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

		consoleLogger('[test]').debug('decrypted text=%j', 'test-secret');

		expect(debug).not.toHaveBeenCalled();
	});

	it('should print debug lines when asked', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

		consoleLogger('[test]', { debug: true }).debug('state=%s', 'authenticated');

		expect(debug).toHaveBeenCalledWith('[test] state=%s', 'authenticated');
	});

	it('should fold the prefix into other levels', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

		consoleLogger('[test]').info('Login complete; account=%s', 'account-1');

		expect(info).toHaveBeenCalledWith('[test] Login complete; account=%s', 'account-1');
	});
});
