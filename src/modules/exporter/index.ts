import fs from 'fs';
import path from 'path';
import * as fastcsv from 'fast-csv';
import { BusinessEntity, HuntRequest, ReportSink } from '../../types';
import { ExportFormat } from '../../config';
import { logger } from '../observability';

export const EXPORT_COLUMNS = [
    'name',
    'category',
    'location',
    'rating',
    'review_count',
    'url',
    'phone',
    'website_status',
    'performance_score',
] as const;

const PREVIEW_COLUMNS = ['name', 'rating', 'review_count', 'website_status', 'performance_score'] as const;

type CsvRow = Record<(typeof EXPORT_COLUMNS)[number], string | number>;

export function leadFileName(request: HuntRequest, format: ExportFormat): string {
    return `leads_${request.category}_${request.location}.${format}`
        .replace(/ /g, '_')
        .replace(/[\\/]/g, '-');
}

export function toCsvRow(lead: BusinessEntity): CsvRow {
    return {
        name: lead.name,
        category: lead.category,
        location: lead.location,
        rating: lead.rating,
        review_count: lead.review_count,
        url: lead.url ?? '',
        phone: lead.phone ?? '',
        website_status: lead.website_status,
        performance_score: lead.performance_score,
    };
}

/**
 * Console table of the best leads, name column padded to the longest name.
 */
export function formatPreview(leads: readonly BusinessEntity[], rows: number): string[] {
    const top = leads.slice(0, rows);
    const nameWidth = Math.max('name'.length, ...top.map(l => l.name.length));

    const line = (cells: Array<string | number>) =>
        cells.map((cell, i) => (i === 0 ? String(cell).padEnd(nameWidth) : String(cell))).join(' | ');

    return [
        '--- TOP LEADS FOUND ---',
        line([...PREVIEW_COLUMNS]),
        ...top.map(l => line(PREVIEW_COLUMNS.map(column => l[column]))),
    ];
}

function writeCsv(filePath: string, leads: readonly BusinessEntity[]): Promise<void> {
    return new Promise((resolve, reject) => {
        fastcsv
            .writeToPath(filePath, leads.map(toCsvRow), { headers: [...EXPORT_COLUMNS] })
            .on('error', reject)
            .on('finish', () => resolve());
    });
}

export interface FileReportSinkOptions {
    outputDir: string;
    format: ExportFormat;
    previewRows: number;
}

export class FileReportSink implements ReportSink {

    constructor(
        private readonly options: FileReportSinkOptions,
        private readonly print: (line: string) => void = line => console.log(line)
    ) {}

    async deliver(leads: readonly BusinessEntity[], request: HuntRequest): Promise<string> {
        await fs.promises.mkdir(this.options.outputDir, { recursive: true });
        const filePath = path.join(this.options.outputDir, leadFileName(request, this.options.format));

        if (this.options.format === 'json') {
            await fs.promises.writeFile(filePath, JSON.stringify(leads, null, 2), 'utf8');
        } else {
            await writeCsv(filePath, leads);
        }
        logger.log('info', `Successfully exported ${leads.length} leads to ${filePath}`);

        if (this.options.previewRows > 0) {
            this.print('');
            formatPreview(leads, this.options.previewRows).forEach(line => this.print(line));
        }
        return filePath;
    }
}
