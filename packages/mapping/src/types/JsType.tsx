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

/**
 * A runtime type identity. Any constructor qualifies: the boxed primitives
 * (`String`, `Number`, `Boolean`, `BigInt`), built-ins such as `Date` and `Buffer`,
 * driver value types and user classes.
 */
export interface JsType<T = unknown> {
	readonly name: string;
	readonly prototype: T;
}

/** The value a {@link JsType} describes, unboxing the primitive wrappers. */
export type ValueOf<J> = J extends StringConstructor
	? string
	: J extends NumberConstructor
		? number
		: J extends BooleanConstructor
			? boolean
			: J extends BigIntConstructor
				? bigint
				: J extends JsType<infer T>
					? T
					: never;

function constructorOf(prototype: object): JsType | null {
	if (!Object.hasOwn(prototype, 'constructor')) return null;
	const ctor: unknown = Reflect.get(prototype, 'constructor');
	return typeof ctor === 'function' ? ctor : null;
}

/**
 * Returns the type followed by its supertypes, most specific first, ending in `Object`
 * for anything with an ordinary prototype chain.
 */
export function getTypeHierarchy(type: JsType): Array<JsType> {
	const hierarchy: Array<JsType> = [type];
	let prototype: unknown = type.prototype;
	while (typeof prototype === 'object' && prototype !== null) {
		const parent: unknown = Object.getPrototypeOf(prototype);
		if (typeof parent !== 'object' || parent === null) break;
		const parentType = constructorOf(parent);
		if (parentType && !hierarchy.includes(parentType)) {
			hierarchy.push(parentType);
		}
		prototype = parent;
	}
	return hierarchy;
}

/**
 * Whether a value of `subType` can be used where `superType` is expected, i.e. `superType`
 * is `subType` or sits on its prototype chain.
 */
export function isAssignableFrom(superType: JsType, subType: JsType): boolean {
	if (superType === subType) return true;
	return getTypeHierarchy(subType).includes(superType);
}

export function typeOfValue(value: unknown): JsType {
	switch (typeof value) {
		case 'string':
			return String;
		case 'number':
			return Number;
		case 'boolean':
			return Boolean;
		case 'bigint':
			return BigInt;
		case 'symbol':
			return Symbol;
		case 'function':
			return Function;
		case 'undefined':
			throw new InvalidArgumentError('value', 'Cannot determine the type of an undefined value');
		default: {
			if (value === null) {
				throw new InvalidArgumentError('value', 'Cannot determine the type of a null value');
			}
			const prototype: unknown = Object.getPrototypeOf(value);
			if (typeof prototype !== 'object' || prototype === null) return Object;
			const ctor: unknown = Reflect.get(prototype, 'constructor');
			return typeof ctor === 'function' ? ctor : Object;
		}
	}
}

export function typeName(type: JsType | null | undefined): string {
	if (!type) return 'null';
	return type.name || '<anonymous>';
}
