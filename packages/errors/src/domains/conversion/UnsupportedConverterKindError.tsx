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

function describeValue(value: unknown): string {
	if (value === null) return 'null';
	if (typeof value !== 'object') return typeof value;
	const kind: unknown = 'kind' in value ? value.kind : undefined;
	return typeof kind === 'string' ? `object of kind "${kind}"` : 'object without a converter kind';
}

export class UnsupportedConverterKindError extends CqlMapError {
	constructor(value: unknown) {
		super(
			ErrorCodes.UNSUPPORTED_CONVERTER_KIND,
			`Unsupported converter: ${describeValue(value)} is neither a converter, a converter factory nor a generic converter`,
		);
		this.name = 'UnsupportedConverterKindError';
	}
}
