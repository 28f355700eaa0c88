import { describe, it, expect } from "vitest";
import { CatalogBuilder } from "../scraper/catalog.js";
import type { Catalog, EngineFunction } from "../scraper/types.js";
import { UNRESOLVED_PROPERTY_TYPE } from "../constants.js";
import {
  UNKNOWN_INHERITANCE,
  buildReferenceView,
  formatInheritance,
  globalValueName,
  partitionGlobalFunctions,
  primitiveTypeLabel,
  renderReference,
} from "./renderer.js";

function fn(name: string, address: string, description: string, minArgs: number, maxArgs: number): EngineFunction {
  return { name, address, typeName: null, description, minArgs, maxArgs };
}

const CONFIG = {
  primitiveTypes: ["Unknown", "Integer"],
  inheritance: {
    Player: ["Player", "ShapeBase", "SimObject"],
    SimObject: ["SimObject"],
    ExplosionData: ["ExplosionData", "GameBaseData", "SimDataBlock", "SimObject"],
  },
};

function sampleCatalog(): Catalog {
  const builder = new CatalogBuilder();
  builder.addFunction(fn("echo", "4A0010", "Prints text.", 2, 20));
  builder.addFunction(fn("mSin", "4A0020", "Sine.", 2, 2));
  builder.addFunction(fn("VectorAdd", "4A0030", "", 3, 3));
  builder.addFunction(fn("alxPlay", "4A0040", "Plays a sound.", 2, 5));
  builder.addTypeMethod({ ...fn("getName", "42A000", "Returns the name.", 2, 2), typeName: "SimObject" });
  builder.addTypeMethod({ ...fn("getState", "42A010", "", 2, 2), typeName: "Player" });
  builder.addGlobalVariable({ name: "pref::Net::Port", address: "7A1234", typeName: 1, description: null });
  builder.addGlobalVariable({ name: "Server::Dedicated", address: "7A1238", typeName: 9, description: null });
  builder.addProperty("ExplosionData", {
    name: "mass",
    address: "36",
    typeName: UNRESOLVED_PROPERTY_TYPE,
    description: null,
  });
  return builder.build();
}

describe("partitionGlobalFunctions", () => {
  it("splits arithmetic, audio and general functions", () => {
    const groups = partitionGlobalFunctions([
      fn("echo", "1", "", 1, 1),
      fn("mFloor", "2", "", 2, 2),
      fn("MatrixMultiply", "3", "", 3, 3),
      fn("getAudioProfile", "4", "", 2, 2),
      fn("audioSetVolume", "5", "", 2, 2),
      fn("quit", "6", "", 1, 1),
    ]);
    expect(groups.general.map((f) => f.name)).toEqual(["echo", "quit"]);
    expect(groups.arithmetic.map((f) => f.name)).toEqual(["mFloor", "MatrixMultiply"]);
    expect(groups.audio.map((f) => f.name)).toEqual(["getAudioProfile", "audioSetVolume"]);
  });
});

describe("formatInheritance", () => {
  it("links the types that have a section", () => {
    const linked = new Set(["Player", "SimObject"]);
    expect(formatInheritance(["Player", "ShapeBase", "SimObject"], linked)).toBe(
      "[[#Player]] -> ShapeBase -> [[#SimObject]]"
    );
  });

  it("marks unknown ancestry", () => {
    expect(formatInheritance(undefined, new Set())).toBe(UNKNOWN_INHERITANCE);
    expect(formatInheritance([], new Set())).toBe(UNKNOWN_INHERITANCE);
  });
});

describe("globalValueName", () => {
  it("adds the script prefix once", () => {
    expect(globalValueName("pref::Net::Port")).toBe("$pref::Net::Port");
    expect(globalValueName("$Server::Dedicated")).toBe("$Server::Dedicated");
  });
});

describe("primitiveTypeLabel", () => {
  it("labels known codes and falls back to Unknown", () => {
    expect(primitiveTypeLabel(1, ["Unknown", "Integer"])).toBe("Integer");
    expect(primitiveTypeLabel(7, ["Unknown", "Integer"])).toBe("Unknown");
  });
});

describe("buildReferenceView", () => {
  it("shows argument counts without the function name", () => {
    const view = buildReferenceView(sampleCatalog(), CONFIG, "Reference");
    expect(view.globalFunctions).toEqual([
      { name: "echo", address: "4A0010", description: "Prints text.", minArgs: 1, maxArgs: 19 },
    ]);
    expect(view.arithmeticFunctions.map((entry) => entry.name)).toEqual(["mSin", "VectorAdd"]);
    expect(view.audioFunctions.map((entry) => entry.name)).toEqual(["alxPlay"]);
    expect(view.functionCount).toBe(4);
  });

  it("builds type and datablock sections", () => {
    const view = buildReferenceView(sampleCatalog(), CONFIG, "Reference");
    expect(view.types.map((type) => [type.name, type.count, type.inheritance])).toEqual([
      ["SimObject", 1, "[[#SimObject]]"],
      ["Player", 1, "[[#Player]] -> ShapeBase -> [[#SimObject]]"],
    ]);
    expect(view.datablocks).toEqual([
      {
        name: "ExplosionData",
        count: 1,
        inheritance: "[[#ExplosionData]] -> GameBaseData -> SimDataBlock -> [[#SimObject]]",
        properties: [{ name: "mass", offset: "36", type: UNRESOLVED_PROPERTY_TYPE }],
      },
    ]);
  });

  it("labels global values", () => {
    const view = buildReferenceView(sampleCatalog(), CONFIG, "Reference");
    expect(view.globalValues).toEqual([
      { name: "$pref::Net::Port", type: "Integer", address: "7A1234" },
      { name: "$Server::Dedicated", type: "Unknown", address: "7A1238" },
    ]);
  });
});

describe("renderReference", () => {
  const lines = renderReference(sampleCatalog(), CONFIG, "Engine Reference").split("\n");

  it("renders the section headings with totals", () => {
    expect(lines[0]).toBe("====== Engine Reference ======");
    expect(lines).toContain("===== Global Methods (4 total) =====");
    expect(lines).toContain("==== Arithmetic Methods (2 total) ====");
    expect(lines).toContain("==== Audio Methods (1 total) ====");
    expect(lines).toContain("===== Type Methods (2 total methods, 2 total types) =====");
    expect(lines).toContain("===== Global Values (2 total) =====");
    expect(lines).toContain("===== Datablocks (1 total) =====");
  });

  it("renders a function entry line by line", () => {
    const start = lines.indexOf("=== echo ===");
    expect(lines.slice(start, start + 5)).toEqual([
      "=== echo ===",
      "Address in Executable: 0x4A0010",
      "Description: Prints text.",
      "Minimum Arguments: 1",
      "Maximum Arguments: 19",
    ]);
  });

  it("renders type sections with inheritance", () => {
    expect(lines).toContain("==== Player ====");
    expect(lines).toContain("1 total native methods");
    expect(lines).toContain("Inheritance: [[#Player]] -> ShapeBase -> [[#SimObject]]");
  });

  it("renders global values and datablocks", () => {
    expect(lines).toContain("=== $pref::Net::Port ===");
    expect(lines).toContain("Type: Integer");
    expect(lines).toContain("Address in Executable: 0x7A1234");
    expect(lines).toContain("==== ExplosionData ====");
    expect(lines).toContain("Total Properties: 1");
    expect(lines).toContain("Offset: 36");
    expect(lines).toContain("Type: <unresolved>");
  });
});
