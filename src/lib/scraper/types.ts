/**
 * Entity model produced by the scraper.
 */

import type { UNRESOLVED_PROPERTY_TYPE } from "../constants.js";

/**
 * Attributes shared by everything recovered from a registration call.
 */
export interface EngineComponent {
  readonly name: string;
  /** Bare uppercase hex, no prefix */
  readonly address: string | null;
  readonly typeName: string | number | null;
  readonly description: string | null;
}

/**
 * A callable engine function. `typeName` is null for globals and holds the
 * object type for bound methods.
 */
export interface EngineFunction extends EngineComponent {
  readonly typeName: string | null;
  readonly description: string;
  readonly minArgs: number;
  readonly maxArgs: number;
}

export interface GlobalVariable extends EngineComponent {
  /** Primitive type code, labelled by the renderer */
  readonly typeName: number;
  readonly description: null;
}

export interface DatablockProperty extends EngineComponent {
  readonly typeName: typeof UNRESOLVED_PROPERTY_TYPE;
  readonly description: null;
}

export interface Datablock extends EngineComponent {
  readonly address: null;
  readonly typeName: null;
  readonly description: null;
  readonly properties: ReadonlyMap<string, DatablockProperty>;
}

/**
 * The finished, read-only model handed to renderers.
 */
export interface Catalog {
  readonly functions: readonly EngineFunction[];
  readonly functionCount: number;
  readonly typeMethods: ReadonlyMap<string, readonly EngineFunction[]>;
  readonly typeMethodCounts: ReadonlyMap<string, number>;
  readonly typeMethodTotal: number;
  readonly globalVariables: readonly GlobalVariable[];
  readonly datablocks: ReadonlyMap<string, Datablock>;
}
