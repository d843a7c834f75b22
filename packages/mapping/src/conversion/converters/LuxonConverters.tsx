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

import {type AnyConverter, readingConverter, writingConverter} from '@cqlmap/mapping/src/conversion/Converter';
import {DateTime} from 'luxon';

export const DateTimeToDateConverter = writingConverter({
	name: 'DateTimeToDateConverter',
	sourceType: DateTime,
	targetType: Date,
	convert: (dateTime) => dateTime.toJSDate(),
});

export const DateToDateTimeConverter = readingConverter({
	name: 'DateToDateTimeConverter',
	sourceType: Date,
	targetType: DateTime,
	convert: (date) => DateTime.fromJSDate(date, {zone: 'utc'}),
});

export function getLuxonConverters(): ReadonlyArray<AnyConverter> {
	return [DateTimeToDateConverter, DateToDateTimeConverter];
}
