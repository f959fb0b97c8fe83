/**
 * Camera marker tables
 *
 * One CSV per camera view with a `Unix Time` column and `<marker>_x` /
 * `<marker>_y` pixel columns. Marker ids follow the 17-point body layout
 * (6/7 shoulders, 10/11 wrists).
 */

import type { TimeBase } from "../signal/trace";

export const MARKERS = {
  leftShoulder: 6,
  rightShoulder: 7,
  leftWrist: 10,
  rightWrist: 11,
} as const;

export type MarkerName = keyof typeof MARKERS;

const MARKER_NAMES: readonly MarkerName[] = [
  "leftShoulder",
  "rightShoulder",
  "leftWrist",
  "rightWrist",
];

export interface MarkerTrack {
  x: number[];
  y: number[];
}

export interface CameraTable {
  cameraId: number;
  fileName: string;
  time: TimeBase;
  markers: Record<MarkerName, MarkerTrack>;
}

export const TIME_COLUMN = "Unix Time";

/**
 * Camera number from a file name: first run of digits ("Camera3.csv" -> 3).
 */
export function cameraIdFromFileName(fileName: string): number {
  const match = /\d+/.exec(fileName);
  if (!match) {
    throw new Error(`Cannot read a camera number from "${fileName}"`);
  }
  return Number.parseInt(match[0], 10);
}

function parseCell(raw: string | undefined): number {
  const cell = raw?.trim() ?? "";
  if (cell === "") return NaN;
  const value = Number(cell);
  return Number.isFinite(value) ? value : NaN;
}

/**
 * Split one CSV line. Commas inside double quotes stay in the cell and `""`
 * inside quotes is a literal quote.
 */
export function splitRow(line: string): string[] {
  const cells: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      cells.push(cell.trim());
      cell = "";
    } else {
      cell += ch;
    }
  }
  cells.push(cell.trim());
  return cells;
}

/**
 * Parse a camera CSV. Missing, empty or non-numeric marker cells become gaps;
 * rows without a usable time are skipped.
 */
export function parseCameraCsv(content: string, fileName: string): CameraTable {
  const lines = content.split(/\r?\n/).filter((l) => l.trim().length > 0);
  if (lines.length === 0) {
    throw new Error(`Invalid camera table ${fileName}: file is empty`);
  }

  const header = splitRow(lines[0].replace(/^\uFEFF/, ""));
  const timeCol = header.indexOf(TIME_COLUMN);
  if (timeCol === -1) {
    throw new Error(`Invalid camera table ${fileName}: missing '${TIME_COLUMN}' column`);
  }

  const columnOf = (name: string): number => {
    const idx = header.indexOf(name);
    if (idx === -1) {
      throw new Error(`Invalid camera table ${fileName}: missing '${name}' column`);
    }
    return idx;
  };

  const markerCols = MARKER_NAMES.map((name) => ({
    name,
    xCol: columnOf(`${MARKERS[name]}_x`),
    yCol: columnOf(`${MARKERS[name]}_y`),
  }));

  const time: number[] = [];
  const markers: Record<MarkerName, MarkerTrack> = {
    leftShoulder: { x: [], y: [] },
    rightShoulder: { x: [], y: [] },
    leftWrist: { x: [], y: [] },
    rightWrist: { x: [], y: [] },
  };

  for (let i = 1; i < lines.length; i++) {
    const cells = splitRow(lines[i]);
    const t = parseCell(cells[timeCol]);
    if (Number.isNaN(t)) continue;

    if (time.length > 0 && t <= time[time.length - 1]) {
      throw new Error(
        `Invalid camera table ${fileName}: time is not strictly increasing at row ${i + 1}`,
      );
    }
    time.push(t);
    for (const { name, xCol, yCol } of markerCols) {
      markers[name].x.push(parseCell(cells[xCol]));
      markers[name].y.push(parseCell(cells[yCol]));
    }
  }

  return {
    cameraId: cameraIdFromFileName(fileName),
    fileName,
    time,
    markers,
  };
}
