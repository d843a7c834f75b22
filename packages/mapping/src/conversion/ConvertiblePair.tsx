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
import {type JsType, typeName} from '@cqlmap/mapping/src/types/JsType';

/**
 * An ordered (source, target) type pair naming one conversion direction.
 * Two pairs are equal when both type identities match.
 */
export class ConvertiblePair {
	readonly sourceType: JsType;
	readonly targetType: JsType;

	constructor(sourceType: JsType, targetType: JsType) {
		if (!sourceType) throw new InvalidArgumentError('sourceType', 'Source type must not be null');
		if (!targetType) throw new InvalidArgumentError('targetType', 'Target type must not be null');
		this.sourceType = sourceType;
		this.targetType = targetType;
		Object.freeze(this);
	}

	equals(other: ConvertiblePair): boolean {
		return this.sourceType === other.sourceType && this.targetType === other.targetType;
	}

	toString(): string {
		return `${typeName(this.sourceType)} -> ${typeName(this.targetType)}`;
	}
}

/** A map keyed structurally by a (source, target) type pair. */
export class TypePairMap<V> {
	private readonly entries = new Map<JsType, Map<JsType, V>>();

	get(sourceType: JsType, targetType: JsType): V | undefined {
		return this.entries.get(sourceType)?.get(targetType);
	}

	has(sourceType: JsType, targetType: JsType): boolean {
		return this.entries.get(sourceType)?.has(targetType) ?? false;
	}

	set(sourceType: JsType, targetType: JsType, value: V): void {
		let byTarget = this.entries.get(sourceType);
		if (!byTarget) {
			byTarget = new Map();
			this.entries.set(sourceType, byTarget);
		}
		byTarget.set(targetType, value);
	}

	get size(): number {
		let size = 0;
		for (const byTarget of this.entries.values()) size += byTarget.size;
		return size;
	}
}

/** Insertion-ordered set of {@link ConvertiblePair}s with structural membership. */
export class ConvertiblePairSet implements Iterable<ConvertiblePair> {
	private readonly ordered: Array<ConvertiblePair> = [];
	private readonly index = new TypePairMap<ConvertiblePair>();

	add(pair: ConvertiblePair): boolean {
		if (this.index.has(pair.sourceType, pair.targetType)) return false;
		this.index.set(pair.sourceType, pair.targetType, pair);
		this.ordered.push(pair);
		return true;
	}

	contains(sourceType: JsType, targetType: JsType): boolean {
		return this.index.has(sourceType, targetType);
	}

	get size(): number {
		return this.ordered.length;
	}

	toArray(): ReadonlyArray<ConvertiblePair> {
		return [...this.ordered];
	}

	[Symbol.iterator](): Iterator<ConvertiblePair> {
		return this.ordered[Symbol.iterator]();
	}
}
