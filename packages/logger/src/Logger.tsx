/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

import type {ILogger, LogBindings, LogLevel} from '@cqlmap/logger/src/ILogger';
import pino from 'pino';

export interface LoggerOptions {
	name?: string;
	level?: LogLevel;
	bindings?: LogBindings;
}

class PinoLogger implements ILogger {
	constructor(private readonly logger: pino.Logger) {}

	trace(objOrMsg: LogBindings | string, msg?: string): void {
		if (typeof objOrMsg === 'string') this.logger.trace(objOrMsg);
		else this.logger.trace(objOrMsg, msg);
	}

	debug(objOrMsg: LogBindings | string, msg?: string): void {
		if (typeof objOrMsg === 'string') this.logger.debug(objOrMsg);
		else this.logger.debug(objOrMsg, msg);
	}

	info(objOrMsg: LogBindings | string, msg?: string): void {
		if (typeof objOrMsg === 'string') this.logger.info(objOrMsg);
		else this.logger.info(objOrMsg, msg);
	}

	warn(objOrMsg: LogBindings | string, msg?: string): void {
		if (typeof objOrMsg === 'string') this.logger.warn(objOrMsg);
		else this.logger.warn(objOrMsg, msg);
	}

	error(objOrMsg: LogBindings | string, msg?: string): void {
		if (typeof objOrMsg === 'string') this.logger.error(objOrMsg);
		else this.logger.error(objOrMsg, msg);
	}

	child(bindings: LogBindings): ILogger {
		return new PinoLogger(this.logger.child(bindings));
	}
}

export function createLogger(options: LoggerOptions = {}): ILogger {
	const base = pino({
		name: options.name ?? 'cqlmap',
		level: options.level ?? 'info',
		base: options.bindings ?? {},
	});
	return new PinoLogger(base);
}

let _logger: ILogger | null = null;

export function initializeLogger(logger: ILogger): void {
	_logger = logger;
}

export function getLogger(): ILogger {
	if (!_logger) {
		_logger = createLogger();
	}
	return _logger;
}

export function createComponentLogger(component: string): ILogger {
	return getLogger().child({component});
}

/**
 * Process-wide logger. Calls are forwarded to whatever logger was last passed to
 * {@link initializeLogger}, so modules can import it before startup configures logging.
 */
export const Logger: ILogger = {
	trace: (objOrMsg: LogBindings | string, msg?: string) => forward('trace', objOrMsg, msg),
	debug: (objOrMsg: LogBindings | string, msg?: string) => forward('debug', objOrMsg, msg),
	info: (objOrMsg: LogBindings | string, msg?: string) => forward('info', objOrMsg, msg),
	warn: (objOrMsg: LogBindings | string, msg?: string) => forward('warn', objOrMsg, msg),
	error: (objOrMsg: LogBindings | string, msg?: string) => forward('error', objOrMsg, msg),
	child: (bindings: LogBindings) => getLogger().child(bindings),
};

function forward(
	level: 'trace' | 'debug' | 'info' | 'warn' | 'error',
	objOrMsg: LogBindings | string,
	msg?: string,
): void {
	const logger = getLogger();
	if (typeof objOrMsg === 'string') logger[level](objOrMsg);
	else logger[level](objOrMsg, msg);
}
