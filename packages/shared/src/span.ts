/** Half-open `[start, end)` range of UTF-16 offsets into a template string. */
export interface TextSpan {
  start: number;
  end: number;
}
