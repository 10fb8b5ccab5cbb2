export interface Location {
  line: number;
  column: number;
  offset: number;
}

export interface Span {
  start: Location;
  end: Location;
  sourceFile: string;
}

/** Span from the start of `a` to the end of `b`, in `a`'s file. */
export function joinSpans(a: Span, b: Span): Span {
  return { start: a.start, end: b.end, sourceFile: a.sourceFile };
}
