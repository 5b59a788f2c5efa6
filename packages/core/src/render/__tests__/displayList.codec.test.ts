import { assert, assertBytesEqual, describe, test } from "@trellis-ui/testkit";
import { type DisplayList, createRecordingCanvas } from "../displayList.js";
import { DISPLAY_LIST_HEADER_SIZE, decodeDisplayList, encodeDisplayList } from "../displayListCodec.js";

function readU32(bytes: Uint8Array, offset: number): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, true);
}

function writeU32(bytes: Uint8Array, offset: number, v: number): void {
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setUint32(offset, v, true);
}

describe("display list codec - layout", () => {
  test("an empty list is a bare header", () => {
    const bytes = encodeDisplayList([]);
    assertBytesEqual(bytes, Uint8Array.from([0x54, 0x52, 0x44, 0x4c, 1, 0, 0, 0, 0, 0, 0, 0, 16, 0, 0, 0]));
  });

  test("record sizes are padded to four bytes", () => {
    const rect = encodeDisplayList([{ op: "rect", x: 0, y: 0, width: 1, height: 1, color: 0 }]);
    assert.equal(rect.byteLength, DISPLAY_LIST_HEADER_SIZE + 48);
    assert.equal(readU32(rect, DISPLAY_LIST_HEADER_SIZE + 4), 48);

    const label = encodeDisplayList([{ op: "label", x: 0, y: 0, text: "hi" }]);
    assert.equal(readU32(label, DISPLAY_LIST_HEADER_SIZE + 4), 32);

    const accented = encodeDisplayList([{ op: "label", x: 0, y: 0, text: "héllo" }]);
    assert.equal(readU32(accented, DISPLAY_LIST_HEADER_SIZE + 4), 36);

    const pop = encodeDisplayList([{ op: "popClip" }]);
    assert.equal(readU32(pop, 8), 1);
    assert.equal(readU32(pop, 12), DISPLAY_LIST_HEADER_SIZE + 8);
  });

  test("decoding restores every command kind", () => {
    const list: DisplayList = [
      { op: "pushClip", x: 0, y: 0, width: 50, height: 30 },
      { op: "rect", x: 0, y: -5, width: 50, height: 10.5, color: 0xffffffff },
      { op: "label", x: 2, y: 3, text: "héllo" },
      { op: "popClip" },
      { op: "overflowIndicator", x: 0, y: 0, width: 100, height: 20 },
      { op: "errorPlaceholder", x: 10, y: 10, width: 80, height: 80, message: "layout failed: Error: no room" },
    ];
    assert.deepEqual(decodeDisplayList(encodeDisplayList(list)), list);
  });

  test("decoding accepts a view at a non-zero offset", () => {
    const encoded = encodeDisplayList([{ op: "label", x: 1, y: 1, text: "ok" }]);
    const padded = new Uint8Array(encoded.byteLength + 4);
    padded.set(encoded, 4);
    assert.deepEqual(decodeDisplayList(padded.subarray(4)), [{ op: "label", x: 1, y: 1, text: "ok" }]);
  });
});

describe("display list codec - malformed input", () => {
  test("truncated header", () => {
    assert.throws(() => decodeDisplayList(new Uint8Array(8)), {
      code: "TRELLIS_PROTOCOL_VIOLATION",
      message: "decodeDisplayList: truncated header",
    });
  });

  test("bad magic and unsupported version", () => {
    const magic = encodeDisplayList([]);
    magic[0] = 0;
    assert.throws(() => decodeDisplayList(magic), { message: "decodeDisplayList: bad magic" });

    const version = encodeDisplayList([]);
    version[4] = 2;
    assert.throws(() => decodeDisplayList(version), { message: "decodeDisplayList: unsupported version 2" });
  });

  test("unknown opcode reports its offset", () => {
    const bytes = encodeDisplayList([{ op: "popClip" }]);
    bytes[DISPLAY_LIST_HEADER_SIZE] = 9;
    assert.throws(() => decodeDisplayList(bytes), { message: "decodeDisplayList: unknown opcode 9 at offset 16" });
  });

  test("declared total larger than the buffer", () => {
    const bytes = encodeDisplayList([]);
    writeU32(bytes, 12, 64);
    assert.throws(() => decodeDisplayList(bytes), { message: "decodeDisplayList: total 64 exceeds 16 bytes" });
  });

  test("trailing bytes after the last command", () => {
    const bytes = new Uint8Array(20);
    bytes.set(encodeDisplayList([]), 0);
    writeU32(bytes, 12, 20);
    assert.throws(() => decodeDisplayList(bytes), { message: "decodeDisplayList: trailing bytes after 0 commands" });
  });
});

describe("recording canvas", () => {
  test("unbalanced popClip is ignored and finish closes open clips", () => {
    const canvas = createRecordingCanvas();
    canvas.popClip();
    canvas.pushClip(0, 0, 10, 10);
    canvas.pushClip(1, 1, 5, 5);
    assert.equal(canvas.clipDepth(), 2);
    assert.deepEqual(canvas.finish(), [
      { op: "pushClip", x: 0, y: 0, width: 10, height: 10 },
      { op: "pushClip", x: 1, y: 1, width: 5, height: 5 },
      { op: "popClip" },
      { op: "popClip" },
    ]);
  });

  test("colors are stored unsigned", () => {
    const canvas = createRecordingCanvas();
    canvas.rect(0, 0, 1, 1, -1);
    assert.deepEqual(canvas.finish(), [{ op: "rect", x: 0, y: 0, width: 1, height: 1, color: 0xffffffff }]);
  });

  test("truncate drops commands and recounts clips", () => {
    const canvas = createRecordingCanvas();
    canvas.rect(0, 0, 1, 1, 1);
    const mark = canvas.mark();
    canvas.pushClip(0, 0, 1, 1);
    canvas.label(0, 0, "gone");
    canvas.truncate(mark);
    assert.equal(canvas.clipDepth(), 0);
    assert.deepEqual(canvas.since(0), [{ op: "rect", x: 0, y: 0, width: 1, height: 1, color: 1 }]);
  });

  test("replay translates positioned commands", () => {
    const canvas = createRecordingCanvas();
    canvas.replay(
      [{ op: "pushClip", x: 0, y: 0, width: 4, height: 4 }, { op: "label", x: 1, y: 2, text: "t" }, { op: "popClip" }],
      10,
      20,
    );
    assert.deepEqual(canvas.finish(), [
      { op: "pushClip", x: 10, y: 20, width: 4, height: 4 },
      { op: "label", x: 11, y: 22, text: "t" },
      { op: "popClip" },
    ]);
  });
});
