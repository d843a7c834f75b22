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

import {CqlMapError} from '@cqlmap/errors/src/CqlMapError';
import {ErrorCodes} from '@cqlmap/errors/src/ErrorCodes';

export class ConversionFailedError extends CqlMapError {
	constructor(sourceTypeName: string, targetTypeName: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(ErrorCodes.CONVERSION_FAILED, `Failed to convert from ${sourceTypeName} to ${targetTypeName}: ${reason}`, {
			details: {sourceType: sourceTypeName, targetType: targetTypeName},
			cause,
		});
		this.name = 'ConversionFailedError';
	}
}
