/**
 * Recording folder layout
 *
 *   <root>/<patient>/<session...>/<segment>/Camera<N>.csv
 *
 * Outputs are written back into each segment folder:
 *   ViewerAssets/<camera file>   per-view signal table
 *   UseSignal.csv                fused RH/LH use signal
 */

import * as fs from "fs";
import * as path from "path";
import type { SegmentResult } from "../../analysis/SegmentPipeline";
import { buildCombinedUseSignalCsv, buildViewerAssetCsv, COMBINED_USE_SIGNAL_FILE } from "../export";
import { exportLog } from "../logger";
import { parseCameraCsv, type CameraTable } from "./cameraTable";

export const VIEWER_ASSETS_DIR = "ViewerAssets";

const CAMERA_FILE = /^Camera.*\.csv$/i;

export interface SegmentSelection {
  /** Empty = every patient folder */
  patients: readonly string[];
  /** Session folder prefixes; empty = every session folder */
  sessions: readonly string[];
  /** Empty = every segment folder */
  segments: readonly string[];
}

export interface SegmentLocation {
  patient: string;
  session: string;
  segment: string;
  segmentDir: string;
  /** Camera CSV file names inside segmentDir */
  cameraFiles: string[];
}

function listFolders(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort();
}

export function listCameraFiles(segmentDir: string): string[] {
  return fs
    .readdirSync(segmentDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && CAMERA_FILE.test(entry.name))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Every selected segment folder under rootDir. A named patient or segment
 * that does not exist is skipped with a warning.
 */
export function listSegments(rootDir: string, selection: SegmentSelection): SegmentLocation[] {
  if (!fs.existsSync(rootDir)) {
    throw new Error(`Root directory not found: ${rootDir}`);
  }

  const patients = selection.patients.length > 0 ? [...selection.patients] : listFolders(rootDir);
  const locations: SegmentLocation[] = [];

  for (const patient of patients) {
    const patientDir = path.join(rootDir, patient);
    if (!fs.existsSync(patientDir)) {
      exportLog.warn(`Patient folder not found: ${patientDir}`);
      continue;
    }

    const sessions = listFolders(patientDir).filter(
      (name) =>
        selection.sessions.length === 0 ||
        selection.sessions.some((prefix) => name.startsWith(prefix)),
    );

    for (const session of sessions) {
      const sessionDir = path.join(patientDir, session);
      const segments =
        selection.segments.length > 0 ? [...selection.segments] : listFolders(sessionDir);

      for (const segment of segments) {
        const segmentDir = path.join(sessionDir, segment);
        if (!fs.existsSync(segmentDir)) {
          exportLog.warn(`Segment folder not found: ${segmentDir}`);
          continue;
        }
        locations.push({
          patient,
          session,
          segment,
          segmentDir,
          cameraFiles: listCameraFiles(segmentDir),
        });
      }
    }
  }

  return locations;
}

export function loadSegmentTables(location: SegmentLocation): CameraTable[] {
  return location.cameraFiles.map((fileName) =>
    parseCameraCsv(fs.readFileSync(path.join(location.segmentDir, fileName), "utf8"), fileName),
  );
}

/** Writes the viewer asset tables and UseSignal.csv; returns the written paths. */
export function writeSegmentOutputs(segmentDir: string, result: SegmentResult): string[] {
  const assetsDir = path.join(segmentDir, VIEWER_ASSETS_DIR);
  if (!fs.existsSync(assetsDir)) {
    fs.mkdirSync(assetsDir, { recursive: true });
  }

  const written: string[] = [];
  for (const view of result.views) {
    const target = path.join(assetsDir, view.fileName);
    fs.writeFileSync(target, buildViewerAssetCsv(view));
    written.push(target);
  }

  const combinedPath = path.join(segmentDir, COMBINED_USE_SIGNAL_FILE);
  fs.writeFileSync(combinedPath, buildCombinedUseSignalCsv(result.combined));
  written.push(combinedPath);

  exportLog.debug(`Wrote ${written.length} files to ${segmentDir}`);
  return written;
}
