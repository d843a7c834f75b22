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
import cassandra from 'cassandra-driver';

const {types} = cassandra;

/**
 * Midnight UTC of the local date, as held by the driver. Days outside the range a `Date` can
 * represent have no such value and are rejected.
 */
export function localDateToUtcDate(localDate: cassandra.types.LocalDate): Date {
	const date: Date | null = localDate.date;
	if (!(date instanceof Date) || Number.isNaN(date.getTime())) {
		throw new RangeError(`Local date ${localDate.toString()} is outside the range of a JavaScript Date`);
	}
	return new Date(date.getTime());
}

export const LocalDateToDateConverter = readingConverter({
	name: 'LocalDateToDateConverter',
	sourceType: types.LocalDate,
	targetType: Date,
	convert: (localDate) => localDateToUtcDate(localDate),
});

export const InetAddressToStringConverter = readingConverter({
	name: 'InetAddressToStringConverter',
	sourceType: types.InetAddress,
	targetType: String,
	convert: (address) => address.toString(),
});

export const LongToBigIntConverter = readingConverter({
	name: 'LongToBigIntConverter',
	sourceType: types.Long,
	targetType: BigInt,
	convert: (long) => BigInt(long.toString()),
});

/** Goes through a double, so decimals with more than 15 significant digits are rounded. */
export const BigDecimalToNumberConverter = readingConverter({
	name: 'BigDecimalToNumberConverter',
	sourceType: types.BigDecimal,
	targetType: Number,
	convert: (decimal) => Number(decimal.toString()),
});

export const LocalTimeToStringConverter = readingConverter({
	name: 'LocalTimeToStringConverter',
	sourceType: types.LocalTime,
	targetType: String,
	convert: (localTime) => localTime.toString(),
});

/** Conversions out of the driver's own value types into plain JavaScript values. */
export function getCassandraConverters(): ReadonlyArray<AnyConverter> {
	return [
		LocalDateToDateConverter,
		InetAddressToStringConverter,
		LongToBigIntConverter,
		BigDecimalToNumberConverter,
		LocalTimeToStringConverter,
	];
}
