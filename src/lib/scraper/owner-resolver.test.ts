import { describe, it, expect, vi } from "vitest";
import { OwnerResolver } from "./owner-resolver.js";
import { Output } from "../output.js";
import { UNLOCATED_OWNER } from "../constants.js";

function subroutine(address: string, body: string[]): string {
  return [
    `//----- (${address}) --------------------------------------------------------`,
    `int __thiscall sub_${address.replace(/^0+/, "")}(int this)`,
    "{",
    ...body.map((line) => `  ${line}`),
    "}",
  ].join("\n");
}

describe("OwnerResolver.locateCaller", () => {
  const resolver = new OwnerResolver({});

  it("reads the address from the enclosing header", () => {
    const text = subroutine("0061E7A0", ['sub_423F20("mass", 5, 36, 1);']);
    expect(resolver.locateCaller(text, text.indexOf("sub_423F20"))).toBe("61E7A0");
  });

  it("ignores dashes in the body before the call", () => {
    const text = subroutine("0061E7A0", ["v2->mass = a1 - 1;", 'sub_423F20("mass", 5, 36, 1);']);
    expect(resolver.locateCaller(text, text.indexOf("sub_423F20"))).toBe("61E7A0");
  });

  it("uses the nearest preceding header", () => {
    const text = [
      subroutine("005B4F60", ['sub_423F20("flowRate", 5, 8, 1);']),
      subroutine("00612400", ['sub_423F20("wheelCount", 1, 12, 1);']),
    ].join("\n");
    expect(resolver.locateCaller(text, text.indexOf('sub_423F20("wheelCount"'))).toBe("612400");
    expect(resolver.locateCaller(text, text.indexOf('sub_423F20("flowRate"'))).toBe("5B4F60");
  });

  it("returns null without a header", () => {
    const text = 'sub_423F20("mass", 5, 36, 1);';
    expect(resolver.locateCaller(text, 0)).toBeNull();
  });

  it("returns null when the header holds no hex address", () => {
    const text = '//----- (unknown) -----\nint f()\n{\n  sub_423F20("mass", 5, 36, 1);\n}';
    expect(resolver.locateCaller(text, text.indexOf("sub_423F20"))).toBeNull();
  });
});

describe("OwnerResolver.resolve", () => {
  it("maps known addresses to their type", () => {
    const resolver = new OwnerResolver({ "61E7A0": "ExplosionData" });
    expect(resolver.resolve("61E7A0")).toBe("ExplosionData");
    expect(resolver.unresolvedAddresses).toEqual([]);
  });

  it("normalizes table keys to uppercase", () => {
    const resolver = new OwnerResolver({ "61e7a0": "ExplosionData" });
    expect(resolver.resolve("61E7A0")).toBe("ExplosionData");
  });

  it("strips leading zeros from table keys", () => {
    const resolver = new OwnerResolver({ "0061E7A0": "ExplosionData" });
    const text = subroutine("0061E7A0", ['sub_423F20("mass", 5, 36, 1);']);
    expect(resolver.resolveAt(text, text.indexOf("sub_423F20"))).toBe("ExplosionData");
    expect(resolver.unresolvedAddresses).toEqual([]);
  });

  it("lets several addresses share a type", () => {
    const resolver = new OwnerResolver({ "6303F0": "GrenadeProjectileData", "6333D0": "GrenadeProjectileData" });
    expect(resolver.resolve("6303F0")).toBe("GrenadeProjectileData");
    expect(resolver.resolve("6333D0")).toBe("GrenadeProjectileData");
  });

  it("registers unknown addresses under their own name and reports them once", () => {
    const out = new Output({ verbose: false });
    const reported = vi.spyOn(out, "unresolvedOwner");
    const table = { "61E7A0": "ExplosionData" };
    const resolver = new OwnerResolver(table, out);

    expect(resolver.resolve("5ABCDE")).toBe("5ABCDE");
    expect(resolver.resolve("5ABCDE")).toBe("5ABCDE");

    expect(resolver.unresolvedAddresses).toEqual(["5ABCDE"]);
    expect(reported).toHaveBeenCalledTimes(1);
    expect(reported).toHaveBeenCalledWith("5ABCDE");
    expect(resolver.table()).toEqual({ "61E7A0": "ExplosionData", "5ABCDE": "5ABCDE" });
    expect(table).toEqual({ "61E7A0": "ExplosionData" });
  });
});

describe("OwnerResolver.resolveAt", () => {
  it("resolves the type of the enclosing subroutine", () => {
    const resolver = new OwnerResolver({ "61E7A0": "ExplosionData" });
    const text = subroutine("0061E7A0", ['sub_423F20("mass", 5, 36, 1);']);
    expect(resolver.resolveAt(text, text.indexOf("sub_423F20"))).toBe("ExplosionData");
  });

  it("assigns properties without a header to the unlocated owner", () => {
    const resolver = new OwnerResolver({});
    expect(resolver.resolveAt('sub_423F20("mass", 5, 36, 1);', 0)).toBe(UNLOCATED_OWNER);
    expect(resolver.unresolvedAddresses).toEqual([]);
  });
});
