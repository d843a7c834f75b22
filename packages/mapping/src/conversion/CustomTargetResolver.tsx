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

import {InvalidArgumentError} from '@cqlmap/errors/src/domains/core/InvalidArgumentError';
import type {ConvertiblePairSet} from '@cqlmap/mapping/src/conversion/ConvertiblePair';
import {isAssignableFrom, type JsType} from '@cqlmap/mapping/src/types/JsType';

/**
 * Finds the registered target for `sourceType` in `pairs`.
 *
 * An exact (source, requested target) pair wins outright. Otherwise the first pair, in
 * registration order, whose source type accepts `sourceType` and whose target type accepts
 * the requested target (when one is given) supplies the answer. The registered target is
 * returned, which may be more general than the requested one.
 */
export function resolveCustomTarget(
	sourceType: JsType | null | undefined,
	requestedTargetType: JsType | null | undefined,
	pairs: ConvertiblePairSet | null | undefined,
): JsType | null {
	if (!sourceType) throw new InvalidArgumentError('sourceType', 'Source type must not be null');
	if (!pairs) throw new InvalidArgumentError('pairs', 'Collection of convertible pairs must not be null');

	if (requestedTargetType && pairs.contains(sourceType, requestedTargetType)) {
		return requestedTargetType;
	}

	for (const pair of pairs) {
		if (!isAssignableFrom(pair.sourceType, sourceType)) continue;
		if (!requestedTargetType || isAssignableFrom(pair.targetType, requestedTargetType)) {
			return pair.targetType;
		}
	}

	return null;
}
