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

import type {JsType} from '@cqlmap/mapping/src/types/JsType';
import cassandra from 'cassandra-driver';

const {types} = cassandra;

/** Types the driver reads and writes directly, without further decomposition. */
export const CASSANDRA_SIMPLE_TYPES: ReadonlyArray<JsType> = [
	String,
	Number,
	Boolean,
	BigInt,
	Date,
	Buffer,
	types.Uuid,
	types.TimeUuid,
	types.LocalDate,
	types.LocalTime,
	types.InetAddress,
	types.Long,
	types.Integer,
	types.BigDecimal,
	types.Duration,
	types.Tuple,
];
