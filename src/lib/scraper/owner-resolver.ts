/**
 * Datablock owner resolution.
 *
 * Property registrations never name their datablock. They are emitted from
 * one subroutine per type, so the owner is the subroutine whose header
 * precedes the call, looked up in an address → type table.
 */

import {
  HEADER_MARKER,
  HEADER_SEPARATOR,
  UNLOCATED_OWNER,
  isHexAddress,
  normalizeAddress,
} from "../constants.js";
import type { Output } from "../output.js";

export class OwnerResolver {
  private readonly types: Map<string, string>;
  private readonly unresolved: string[] = [];
  private readonly out?: Output;

  constructor(table: Readonly<Record<string, string>>, out?: Output) {
    this.types = new Map(
      Object.entries(table).map(([address, type]) => [
        isHexAddress(address) ? normalizeAddress(address) : address.toUpperCase(),
        type,
      ])
    );
    this.out = out;
  }

  /**
   * Address of the subroutine enclosing `position`, as bare uppercase hex,
   * or null when no header with a hex address precedes it.
   *
   * The header slice runs from the nearest `//----- ` marker to the last
   * dash before the call; its first parenthesized expression is the address.
   */
  locateCaller(text: string, position: number): string | null {
    const headerStart = text.lastIndexOf(HEADER_MARKER, position);
    if (headerStart === -1) {
      return null;
    }
    let headerEnd = text.lastIndexOf(HEADER_SEPARATOR, position - 1);
    if (headerEnd < headerStart) {
      headerEnd = position;
    }
    const header = text.slice(headerStart, headerEnd);

    const open = header.indexOf("(");
    const close = header.indexOf(")", open);
    if (open === -1 || close === -1) {
      return null;
    }
    const digits = header.slice(open + 1, close).trim();
    if (!isHexAddress(digits)) {
      return null;
    }
    return normalizeAddress(digits);
  }

  /**
   * Type name for a subroutine address. Unknown addresses become their own
   * type name and are reported once.
   */
  resolve(address: string): string {
    const known = this.types.get(address);
    if (known !== undefined) {
      return known;
    }
    this.types.set(address, address);
    this.unresolved.push(address);
    this.out?.unresolvedOwner(address);
    return address;
  }

  /**
   * Owning datablock type for a property registration at `position`.
   */
  resolveAt(text: string, position: number): string {
    const caller = this.locateCaller(text, position);
    return caller === null ? UNLOCATED_OWNER : this.resolve(caller);
  }

  /** Addresses that fell back to synthetic type names, in discovery order */
  get unresolvedAddresses(): readonly string[] {
    return this.unresolved;
  }

  /** The lookup table including synthetic entries */
  table(): Record<string, string> {
    return Object.fromEntries(this.types);
  }
}
