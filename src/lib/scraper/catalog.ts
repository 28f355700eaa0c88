/**
 * Assembly of extracted records into the catalog.
 */

import type {
  Catalog,
  Datablock,
  DatablockProperty,
  EngineFunction,
  GlobalVariable,
} from "./types.js";

export class CatalogBuilder {
  private readonly functions: EngineFunction[] = [];
  private readonly typeMethods = new Map<string, EngineFunction[]>();
  private readonly typeMethodCounts = new Map<string, number>();
  private typeMethodTotal = 0;
  private readonly globalVariables: GlobalVariable[] = [];
  private readonly properties = new Map<string, Map<string, DatablockProperty>>();

  addFunction(fn: EngineFunction): void {
    this.functions.push(Object.freeze(fn));
  }

  /**
   * Group a bound method under its type, keeping per-type and total counts.
   */
  addTypeMethod(fn: EngineFunction & { typeName: string }): void {
    let methods = this.typeMethods.get(fn.typeName);
    if (!methods) {
      methods = [];
      this.typeMethods.set(fn.typeName, methods);
    }
    methods.push(Object.freeze(fn));
    this.typeMethodCounts.set(fn.typeName, (this.typeMethodCounts.get(fn.typeName) ?? 0) + 1);
    this.typeMethodTotal++;
  }

  addGlobalVariable(variable: GlobalVariable): void {
    this.globalVariables.push(Object.freeze(variable));
  }

  /**
   * Add a property to its datablock, creating the datablock on first use.
   * A later registration of the same property name replaces the earlier one.
   */
  addProperty(owner: string, property: DatablockProperty): void {
    let properties = this.properties.get(owner);
    if (!properties) {
      properties = new Map();
      this.properties.set(owner, properties);
    }
    properties.set(property.name, Object.freeze(property));
  }

  build(): Catalog {
    const datablocks = new Map<string, Datablock>();
    for (const [name, properties] of this.properties) {
      datablocks.set(
        name,
        Object.freeze({
          name,
          address: null,
          typeName: null,
          description: null,
          properties: new Map(properties),
        })
      );
    }

    const typeMethods = new Map<string, readonly EngineFunction[]>();
    for (const [type, methods] of this.typeMethods) {
      typeMethods.set(type, Object.freeze([...methods]));
    }

    return Object.freeze({
      functions: Object.freeze([...this.functions]),
      functionCount: this.functions.length,
      typeMethods,
      typeMethodCounts: new Map(this.typeMethodCounts),
      typeMethodTotal: this.typeMethodTotal,
      globalVariables: Object.freeze([...this.globalVariables]),
      datablocks,
    });
  }
}
