import * as fs from 'fs';
import * as path from 'path';
import pdf from 'pdf-parse';
import mammoth from 'mammoth';
import { logger, ILogger } from '../config/logger';
import type { DocumentHandle } from '../models/candidate-record';
import { ExtractionFailure, Result, fail, ok } from '../types/errors';

// Interfaces for better testability
export interface IFileReader {
    readFile(filePath: string): Promise<Buffer>;
}

export interface IPDFParser {
    (buffer: Buffer): Promise<{ text: string }>;
}

export interface IWordParser {
    extractRawText(input: { buffer: Buffer }): Promise<{ value: string }>;
}

export interface IDocumentExtractor {
    extract(document: DocumentHandle): Promise<Result<string, ExtractionFailure>>;
}

type DocumentFormat = 'pdf' | 'docx' | 'text';

const FORMATS_BY_EXTENSION: Record<string, DocumentFormat> = {
    '.pdf': 'pdf',
    '.docx': 'docx',
    '.txt': 'text',
    '.text': 'text',
    '.md': 'text'
};

export const SUPPORTED_EXTENSIONS = Object.keys(FORMATS_BY_EXTENSION);

/**
 * Document Extractor
 *
 * Turns an uploaded resume or job description into plain text.
 * PDFs go through pdf-parse, Word documents through mammoth, text files
 * are read as UTF-8. Failures are returned, never thrown.
 */
export class DocumentExtractorService implements IDocumentExtractor {
    constructor(
        private logger: ILogger,
        private fileReader: IFileReader = fs.promises,
        private pdfParser: IPDFParser = pdf,
        private wordParser: IWordParser = mammoth
    ) { }

    /**
     * Factory method for production use
     */
    static create(): DocumentExtractorService {
        return new DocumentExtractorService(logger, fs.promises, pdf, mammoth);
    }

    static formatOf(fileName: string): DocumentFormat | null {
        return FORMATS_BY_EXTENSION[path.extname(fileName).toLowerCase()] ?? null;
    }

    async extract(document: DocumentHandle): Promise<Result<string, ExtractionFailure>> {
        const format = DocumentExtractorService.formatOf(document.name);
        if (!format) {
            return fail('UnsupportedFormat', `Unsupported document type: ${path.extname(document.name) || document.name}`);
        }

        let buffer: Buffer;
        try {
            buffer = await this.fileReader.readFile(document.path);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error({ document: document.name, error: reason }, 'Failed to read document');
            return fail('IOError', `Could not read ${document.name}: ${reason}`);
        }

        let text: string;
        try {
            text = await this.parse(format, buffer);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.warn({ document: document.name, format, error: reason }, 'Document parsing failed');
            return fail('CorruptFile', `Could not parse ${document.name}: ${reason}`);
        }

        if (text.trim().length === 0) {
            return fail('CorruptFile', `${document.name} contains no extractable text`);
        }

        this.logger.debug({
            document: document.name,
            format,
            textLength: text.length
        }, 'Document text extracted');

        return ok(text);
    }

    private async parse(format: DocumentFormat, buffer: Buffer): Promise<string> {
        switch (format) {
            case 'pdf':
                return (await this.pdfParser(buffer)).text;
            case 'docx':
                return (await this.wordParser.extractRawText({ buffer })).value;
            case 'text':
                return buffer.toString('utf-8');
        }
    }
}

// Singleton instance
let documentExtractor: DocumentExtractorService | null = null;

export function getDocumentExtractor(): DocumentExtractorService {
    if (!documentExtractor) {
        documentExtractor = DocumentExtractorService.create();
    }
    return documentExtractor;
}
