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

export class DuplicateResultError extends CqlMapError {
	readonly query: string;

	constructor(query: string) {
		super(ErrorCodes.DUPLICATE_RESULT, `Found two or more results in query ${query}`, {details: {query}});
		this.name = 'DuplicateResultError';
		this.query = query;
	}
}
