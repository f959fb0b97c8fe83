/**
 * Batch movement detection
 *
 * Walks the selected patient/session/segment folders, processes every
 * segment's camera views, prints movement reports and (optionally) writes
 * the viewer assets and UseSignal.csv next to the input.
 *
 * Configuration comes from the environment (or a .env file):
 *   LIMB_USE_ROOT_DIR=/data/recordings LIMB_USE_PATIENTS=P02 npm run detect
 */

import { config as loadEnv } from 'dotenv';
import {
    loadBatchOptionsFromEnv,
    loadPipelineConfigFromEnv,
} from '../src/lib/config/pipelineConfig';
import { listSegments, loadSegmentTables, writeSegmentOutputs } from '../src/lib/io/sessionLayout';
import { pipelineLog } from '../src/lib/logger';
import { printReportLines, processRecordingSegment, reportSegment } from '../src/analysis';

loadEnv();

function main(): number {
    const pipelineConfig = loadPipelineConfigFromEnv();
    const options = loadBatchOptionsFromEnv();

    const segments = listSegments(options.rootDir, options);
    pipelineLog.info(`Found ${segments.length} segments under ${options.rootDir}`);

    let failures = 0;
    for (const location of segments) {
        const label = `${location.patient}/${location.session}/${location.segment}`;
        if (location.cameraFiles.length === 0) {
            pipelineLog.warn(`${label}: no camera files, skipping`);
            continue;
        }

        try {
            const result = processRecordingSegment(loadSegmentTables(location), pipelineConfig);

            if (options.showReports) {
                printReportLines([`Segment ${label}`, ...reportSegment(result)]);
            }
            if (options.saveCsv) {
                writeSegmentOutputs(location.segmentDir, result);
            }
        } catch (err) {
            failures++;
            pipelineLog.error(`${label}: processing failed`, err);
        }
    }

    printReportLines([`Done: ${segments.length} segments, ${failures} failed`]);
    return failures > 0 ? 1 : 0;
}

try {
    process.exitCode = main();
} catch (err) {
    pipelineLog.error('Batch run aborted', err);
    process.exitCode = 1;
}
