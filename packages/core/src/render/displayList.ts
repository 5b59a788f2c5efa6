/**
 * packages/core/src/render/displayList.ts — Paint commands and the recording canvas.
 *
 * Painting produces a flat list of commands in paint order. Rasterization is
 * external: `label` carries an opaque string for a text system to shape,
 * colors are packed 0xRRGGBB integers.
 */

export type RectCommand = Readonly<{
  op: "rect";
  x: number;
  y: number;
  width: number;
  height: number;
  color: number;
}>;
export type PushClipCommand = Readonly<{
  op: "pushClip";
  x: number;
  y: number;
  width: number;
  height: number;
}>;
export type PopClipCommand = Readonly<{ op: "popClip" }>;
export type LabelCommand = Readonly<{ op: "label"; x: number; y: number; text: string }>;
export type OverflowIndicatorCommand = Readonly<{
  op: "overflowIndicator";
  x: number;
  y: number;
  width: number;
  height: number;
}>;
export type ErrorPlaceholderCommand = Readonly<{
  op: "errorPlaceholder";
  x: number;
  y: number;
  width: number;
  height: number;
  message: string;
}>;

export type PaintCommand =
  | RectCommand
  | PushClipCommand
  | PopClipCommand
  | LabelCommand
  | OverflowIndicatorCommand
  | ErrorPlaceholderCommand;

export type DisplayList = readonly PaintCommand[];

export type Canvas = Readonly<{
  rect: (x: number, y: number, width: number, height: number, color: number) => void;
  pushClip: (x: number, y: number, width: number, height: number) => void;
  popClip: () => void;
  label: (x: number, y: number, text: string) => void;
  overflowIndicator: (x: number, y: number, width: number, height: number) => void;
  errorPlaceholder: (x: number, y: number, width: number, height: number, message: string) => void;
}>;

/** Canvas that records into an array; the render tree uses marks to slice per-node output. */
export type RecordingCanvas = Canvas &
  Readonly<{
    /** Current command count (a position that `truncate` and `since` accept). */
    mark: () => number;
    /** Drop every command recorded after `mark`. */
    truncate: (mark: number) => void;
    /** Commands recorded since `mark`. */
    since: (mark: number) => readonly PaintCommand[];
    /** Append previously recorded commands, translated by (dx, dy). */
    replay: (commands: readonly PaintCommand[], dx: number, dy: number) => void;
    /** Open clips not yet popped. */
    clipDepth: () => number;
    finish: () => DisplayList;
  }>;

export function translateCommand(cmd: PaintCommand, dx: number, dy: number): PaintCommand {
  if (dx === 0 && dy === 0) return cmd;
  switch (cmd.op) {
    case "popClip":
      return cmd;
    case "rect":
    case "pushClip":
    case "label":
    case "overflowIndicator":
    case "errorPlaceholder":
      return Object.freeze({ ...cmd, x: cmd.x + dx, y: cmd.y + dy });
  }
}

export function createRecordingCanvas(): RecordingCanvas {
  const commands: PaintCommand[] = [];
  let clips = 0;

  const push = (cmd: PaintCommand): void => {
    commands.push(cmd);
  };

  const recount = (): void => {
    let depth = 0;
    for (const cmd of commands) {
      if (cmd.op === "pushClip") depth++;
      else if (cmd.op === "popClip") depth--;
    }
    clips = depth;
  };

  return Object.freeze({
    rect(x: number, y: number, width: number, height: number, color: number): void {
      push(Object.freeze({ op: "rect", x, y, width, height, color: color >>> 0 }));
    },
    pushClip(x: number, y: number, width: number, height: number): void {
      clips++;
      push(Object.freeze({ op: "pushClip", x, y, width, height }));
    },
    popClip(): void {
      if (clips === 0) return;
      clips--;
      push(Object.freeze({ op: "popClip" }));
    },
    label(x: number, y: number, text: string): void {
      push(Object.freeze({ op: "label", x, y, text }));
    },
    overflowIndicator(x: number, y: number, width: number, height: number): void {
      push(Object.freeze({ op: "overflowIndicator", x, y, width, height }));
    },
    errorPlaceholder(x: number, y: number, width: number, height: number, message: string): void {
      push(Object.freeze({ op: "errorPlaceholder", x, y, width, height, message }));
    },
    mark(): number {
      return commands.length;
    },
    truncate(mark: number): void {
      if (mark < commands.length) {
        commands.length = mark;
        recount();
      }
    },
    since(mark: number): readonly PaintCommand[] {
      return Object.freeze(commands.slice(mark));
    },
    replay(recorded: readonly PaintCommand[], dx: number, dy: number): void {
      for (const cmd of recorded) {
        if (cmd.op === "pushClip") clips++;
        else if (cmd.op === "popClip") clips--;
        commands.push(translateCommand(cmd, dx, dy));
      }
    },
    clipDepth(): number {
      return clips;
    },
    finish(): DisplayList {
      while (clips > 0) {
        clips--;
        commands.push(Object.freeze({ op: "popClip" }));
      }
      return Object.freeze(commands.slice());
    },
  });
}
