import * as fs from 'fs';
import * as path from 'path';
import { logger, ILogger } from '../config/logger';
import type { BatchReport } from './report-aggregator';

export interface IFileWriter {
    mkdir(dir: string, options: { recursive: true }): Promise<unknown>;
    writeFile(filePath: string, data: string, encoding: 'utf-8'): Promise<void>;
}

/**
 * Report Exporter
 *
 * Writes a finished report to disk as pretty-printed JSON, one file per batch.
 */
export class ReportExporterService {
    constructor(
        private logger: ILogger,
        private fileWriter: IFileWriter = fs.promises
    ) { }

    static create(): ReportExporterService {
        return new ReportExporterService(logger, fs.promises);
    }

    static fileNameFor(report: BatchReport): string {
        return `resume-screening-${report.metadata.batch_id}.json`;
    }

    static serialize(report: BatchReport): string {
        return JSON.stringify(report, null, 2);
    }

    async export(report: BatchReport, directory: string): Promise<string> {
        const target = path.join(directory, ReportExporterService.fileNameFor(report));

        await this.fileWriter.mkdir(directory, { recursive: true });
        await this.fileWriter.writeFile(target, ReportExporterService.serialize(report), 'utf-8');

        this.logger.info({
            batchId: report.metadata.batch_id,
            path: target,
            results: report.results.length
        }, 'Report exported');

        return target;
    }
}
