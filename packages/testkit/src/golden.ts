import { AssertionError } from "node:assert";

/** Hex dump in 16-byte rows: `0000: 54 52 44 4c ...`. */
export function hexdump(bytes: Uint8Array): string {
  const rows: string[] = [];
  for (let off = 0; off < bytes.length; off += 16) {
    const row = bytes.subarray(off, Math.min(off + 16, bytes.length));
    const hex = Array.from(row, (b) => b.toString(16).padStart(2, "0")).join(" ");
    rows.push(`${off.toString(16).padStart(4, "0")}: ${hex}`);
  }
  return rows.join("\n");
}

/** Byte-exact comparison that reports the first differing offset. */
export function assertBytesEqual(actual: Uint8Array, expected: Uint8Array, label = "bytes"): void {
  const len = Math.min(actual.length, expected.length);
  for (let i = 0; i < len; i++) {
    if (actual[i] !== expected[i]) {
      throw new AssertionError({
        message: `${label}: first difference at offset ${String(i)}\nactual:\n${hexdump(actual)}\nexpected:\n${hexdump(expected)}`,
        actual: actual[i],
        expected: expected[i],
      });
    }
  }
  if (actual.length !== expected.length) {
    throw new AssertionError({
      message: `${label}: length ${String(actual.length)} !== ${String(expected.length)}`,
      actual: actual.length,
      expected: expected.length,
    });
  }
}
