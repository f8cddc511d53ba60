/**
 * Generated sections are marker-delimited blocks inside otherwise hand-written files.
 *
 * A target file holds at most one section:
 *
 *   ### GENERATED SECTION - DO NOT MODIFY - BEGIN ###
 *   <replacement block>
 *   ### GENERATED SECTION - DO NOT MODIFY - END ###
 *
 * Everything outside the section is copied through untouched and in order.
 */

import { MarkerError } from "../errors.js";

export interface MarkerPair {
  begin: string;
  end: string;
}

export const DEFAULT_MARKERS: MarkerPair = {
  begin: "### GENERATED SECTION - DO NOT MODIFY - BEGIN ###",
  end: "### GENERATED SECTION - DO NOT MODIFY - END ###",
};

/**
 * Scanner state. `copying` passes lines through; `skipping` drops the body of
 * the existing section until its end marker.
 */
type ScanState = "copying" | "skipping";

export interface ApplyOptions {
  markers?: MarkerPair;
  /** Name used in error messages, usually the file path. */
  source?: string;
}

/**
 * Split text into lines, each keeping its own terminator.
 * A final line without a terminator is kept as-is.
 */
export function splitLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Replace (or append) the generated section of `content` with `block`.
 *
 * Throws MarkerError when `block` itself contains a marker, and on a nested
 * begin marker, a stray end marker, a second section, or a section left open
 * at end of input.
 */
export function applyMarkedBlock(
  content: string,
  block: string,
  opts: ApplyOptions = {},
): string {
  const { markers = DEFAULT_MARKERS, source = "input" } = opts;
  for (const [i, line] of splitLines(block).entries()) {
    if (line.includes(markers.begin) || line.includes(markers.end)) {
      throw new MarkerError(`replacement block for ${source} contains a marker at line ${i + 1}`, i + 1);
    }
  }
  const body = block.endsWith("\n") ? block : `${block}\n`;
  const output: string[] = [];

  let state: ScanState = "copying";
  let sectionWritten = false;
  let openedAt = 0;

  for (const [i, line] of splitLines(content).entries()) {
    const lineNo = i + 1;
    const isBegin = line.includes(markers.begin);
    const isEnd = line.includes(markers.end);

    switch (state) {
      case "copying":
        if (isBegin) {
          if (sectionWritten) {
            throw new MarkerError(
              `${source}:${lineNo}: second generated section found (first one opened at line ${openedAt})`,
              lineNo,
            );
          }
          output.push(line, body);
          sectionWritten = true;
          openedAt = lineNo;
          state = "skipping";
        } else if (isEnd) {
          throw new MarkerError(`${source}:${lineNo}: end marker without a matching begin marker`, lineNo);
        } else {
          output.push(line);
        }
        break;

      case "skipping":
        if (isBegin) {
          throw new MarkerError(
            `${source}:${lineNo}: begin marker inside the section opened at line ${openedAt}`,
            lineNo,
          );
        }
        if (isEnd) {
          output.push(line);
          state = "copying";
        }
        break;
    }
  }

  if (state === "skipping") {
    throw new MarkerError(`${source}:${openedAt}: generated section is never closed`, openedAt);
  }

  if (!sectionWritten) {
    const last = output[output.length - 1];
    if (last !== undefined && !last.endsWith("\n")) {
      output.push("\n");
    }
    output.push(`${markers.begin}\n`, body, `${markers.end}\n`);
  }

  return output.join("");
}
