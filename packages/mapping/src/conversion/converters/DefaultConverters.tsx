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

import type {AnyConverter} from '@cqlmap/mapping/src/conversion/Converter';
import {getCassandraConverters} from '@cqlmap/mapping/src/conversion/converters/CassandraConverters';
import {getCassandraLuxonConverters} from '@cqlmap/mapping/src/conversion/converters/CassandraLuxonConverters';
import {getLuxonConverters} from '@cqlmap/mapping/src/conversion/converters/LuxonConverters';

/**
 * Built-in converters in registration order. They are registered after user converters,
 * so a user converter for the same pair always wins.
 */
export function getDefaultConverters(): ReadonlyArray<AnyConverter> {
	return [...getCassandraConverters(), ...getCassandraLuxonConverters(), ...getLuxonConverters()];
}
