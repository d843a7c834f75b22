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

import {type AnyConverter, readingConverter} from '@cqlmap/mapping/src/conversion/Converter';
import {localDateToUtcDate} from '@cqlmap/mapping/src/conversion/converters/CassandraConverters';
import cassandra from 'cassandra-driver';
import {DateTime} from 'luxon';

const {types} = cassandra;

export const LocalDateToDateTimeConverter = readingConverter({
	name: 'LocalDateToDateTimeConverter',
	sourceType: types.LocalDate,
	targetType: DateTime,
	convert: (localDate) => DateTime.fromJSDate(localDateToUtcDate(localDate), {zone: 'utc'}),
});

/** Conversions between Cassandra date types and luxon. */
export function getCassandraLuxonConverters(): ReadonlyArray<AnyConverter> {
	return [LocalDateToDateTimeConverter];
}
