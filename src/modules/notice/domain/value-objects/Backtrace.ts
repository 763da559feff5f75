import path from 'path';
import { LIBRARY_ROOT } from '../../../../shared/paths';

/**
 * One frame of a backtrace as sent to the collection endpoint
 */
export interface StackFrame {
  file: string;
  line: number | null;
  column: number | null;
  function: string;
}

/**
 * Returns the raw V8 stack text of the current call site
 */
export type StackCapture = () => string;

/**
 * Decides whether a frame belongs to this library's own internals
 */
export type FramePredicate = (frame: StackFrame) => boolean;

export const UNKNOWN_FILE = '<unknown>';

// "at fn (file:1:2)", "at file:1:2", "at async fn (file:1:2)", "at new Foo (file:1:2)"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;
const FRAME_LINE = /^\s*at /;
const CAPTURE_FRAME_LIMIT = 50;

/**
 * Parses V8 stack text into frames, skipping the "Name: message" header.
 * Lines that carry no location ("at async Promise.all (index 0)") keep their
 * text as the function name with an unknown file.
 */
export function parseStack(stack: string): StackFrame[] {
  return stack
    .split('\n')
    .filter((line) => FRAME_LINE.test(line))
    .map(parseFrame);
}

function parseFrame(line: string): StackFrame {
  const match = FRAME_PATTERN.exec(line);
  if (!match) {
    return {
      file: UNKNOWN_FILE,
      line: null,
      column: null,
      function: line.replace(FRAME_LINE, '').trim(),
    };
  }

  const [, fn, file, lineNumber, column] = match;
  return {
    file: file ?? UNKNOWN_FILE,
    line: lineNumber ? parseInt(lineNumber, 10) : null,
    column: column ? parseInt(column, 10) : null,
    function: (fn ?? '').replace(/^async /, ''),
  };
}

export const defaultStackCapture: StackCapture = () => {
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = CAPTURE_FRAME_LIMIT;
  try {
    return new Error().stack ?? '';
  } finally {
    Error.stackTraceLimit = previousLimit;
  }
};

export const isLibraryFrame: FramePredicate = (frame) =>
  frame.file.startsWith(LIBRARY_ROOT + path.sep);

/**
 * Synthesizes a backtrace for an error that has none.
 *
 * Leading frames that belong to the library are dropped so the first frame
 * is the caller's. If every frame is internal the untrimmed stack is kept.
 */
export function captureBacktrace(
  capture: StackCapture = defaultStackCapture,
  isInternal: FramePredicate = isLibraryFrame
): StackFrame[] {
  const frames = parseStack(capture());
  const firstExternal = frames.findIndex((frame) => !isInternal(frame));
  return firstExternal === -1 ? frames : frames.slice(firstExternal);
}
