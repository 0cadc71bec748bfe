import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
    DocumentExtractorService,
    IFileReader,
    IPDFParser,
    IWordParser,
    SUPPORTED_EXTENSIONS
} from '../../../src/services/document-extractor.service';
import { createMockLogger } from '../../helpers/logger-mock';

// Mock the logger
vi.mock('../../../src/config/logger', () => import('../../helpers/logger-mock'));

describe('DocumentExtractorService', () => {
    let mockLogger: ReturnType<typeof createMockLogger>;
    let fileReader: { readFile: Mock<IFileReader['readFile']> };
    let pdfParser: Mock<IPDFParser>;
    let wordParser: { extractRawText: Mock<IWordParser['extractRawText']> };
    let extractor: DocumentExtractorService;

    beforeEach(() => {
        vi.clearAllMocks();
        mockLogger = createMockLogger();
        fileReader = { readFile: vi.fn<IFileReader['readFile']>().mockResolvedValue(Buffer.from('file bytes')) };
        pdfParser = vi.fn<IPDFParser>().mockResolvedValue({ text: 'Ada Lovelace\nTypeScript engineer' });
        wordParser = { extractRawText: vi.fn<IWordParser['extractRawText']>().mockResolvedValue({ value: 'Bob Smith\nGo developer' }) };
        extractor = new DocumentExtractorService(mockLogger, fileReader, pdfParser, wordParser);
    });

    describe('extract', () => {
        it('should extract text from a PDF', async () => {
            const result = await extractor.extract({ path: '/uploads/resumes-1.pdf', name: 'ada.pdf' });

            expect(result).toEqual({ ok: true, value: 'Ada Lovelace\nTypeScript engineer' });
            expect(fileReader.readFile).toHaveBeenCalledWith('/uploads/resumes-1.pdf');
            expect(pdfParser).toHaveBeenCalledWith(Buffer.from('file bytes'));
            expect(wordParser.extractRawText).not.toHaveBeenCalled();
        });

        it('should extract text from a Word document', async () => {
            const result = await extractor.extract({ path: '/uploads/resumes-2.docx', name: 'Bob.DOCX' });

            expect(result).toEqual({ ok: true, value: 'Bob Smith\nGo developer' });
            expect(wordParser.extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from('file bytes') });
        });

        it('should read plain text files as UTF-8', async () => {
            fileReader.readFile.mockResolvedValue(Buffer.from('Cyd Jones – café owner', 'utf-8'));

            const result = await extractor.extract({ path: '/uploads/cyd.txt', name: 'cyd.txt' });

            expect(result).toEqual({ ok: true, value: 'Cyd Jones – café owner' });
            expect(pdfParser).not.toHaveBeenCalled();
        });

        it('should reject unsupported formats without reading the file', async () => {
            const result = await extractor.extract({ path: '/uploads/photo.png', name: 'photo.png' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'UnsupportedFormat', message: 'Unsupported document type: .png' }
            });
            expect(fileReader.readFile).not.toHaveBeenCalled();
        });

        it('should name the file when it has no extension', async () => {
            const result = await extractor.extract({ path: '/uploads/README', name: 'README' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'UnsupportedFormat', message: 'Unsupported document type: README' }
            });
        });

        it('should report an unreadable file as IOError', async () => {
            fileReader.readFile.mockRejectedValue(new Error('ENOENT: no such file or directory'));

            const result = await extractor.extract({ path: '/uploads/gone.pdf', name: 'gone.pdf' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'IOError', message: 'Could not read gone.pdf: ENOENT: no such file or directory' }
            });
            expect(mockLogger.error).toHaveBeenCalledWith(
                { document: 'gone.pdf', error: 'ENOENT: no such file or directory' },
                'Failed to read document'
            );
        });

        it('should report a parser failure as CorruptFile', async () => {
            pdfParser.mockRejectedValue(new Error('Invalid PDF structure'));

            const result = await extractor.extract({ path: '/uploads/broken.pdf', name: 'broken.pdf' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'CorruptFile', message: 'Could not parse broken.pdf: Invalid PDF structure' }
            });
        });

        it('should report a document without text as CorruptFile', async () => {
            pdfParser.mockResolvedValue({ text: '  \n\t ' });

            const result = await extractor.extract({ path: '/uploads/scan.pdf', name: 'scan.pdf' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'CorruptFile', message: 'scan.pdf contains no extractable text' }
            });
        });
    });

    describe('formatOf', () => {
        it('should match extensions case-insensitively', () => {
            expect(DocumentExtractorService.formatOf('CV.PDF')).toBe('pdf');
            expect(DocumentExtractorService.formatOf('cv.docx')).toBe('docx');
            expect(DocumentExtractorService.formatOf('notes.md')).toBe('text');
            expect(DocumentExtractorService.formatOf('cv.doc')).toBeNull();
        });

        it('should list every supported extension', () => {
            expect(SUPPORTED_EXTENSIONS).toEqual(['.pdf', '.docx', '.txt', '.text', '.md']);
        });
    });
});
