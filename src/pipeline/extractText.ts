import fs from 'node:fs/promises';
import path from 'node:path';
import pdfParse from 'pdf-parse';

import { ExtractionError, UnsupportedDocumentError } from '../util/errors';

export type DocumentFormat = 'pdf' | 'text';

export type ExtractedDocument = {
  text: string;
  pages: number;
  format: DocumentFormat;
};

const FORMATS_BY_EXTENSION: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.txt': 'text',
  '.md': 'text',
};

export const detectFormat = (fileName: string): DocumentFormat | undefined =>
  FORMATS_BY_EXTENSION[path.extname(fileName).toLowerCase()];

export const normalizeText = (raw: string): string =>
  raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

const readPdf = async (filePath: string): Promise<{ text: string; pages: number }> => {
  const fileBuffer = await fs.readFile(filePath);

  let result: { text?: string; numpages?: number };
  try {
    result = await pdfParse(fileBuffer);
  } catch (error) {
    throw new ExtractionError(`Could not read PDF "${path.basename(filePath)}".`, { cause: error });
  }

  const pages = typeof result.numpages === 'number' ? Math.max(0, Math.trunc(result.numpages)) : 0;

  return {
    text: result.text ?? '',
    pages,
  };
};

export const extractText = async (filePath: string): Promise<ExtractedDocument> => {
  const format = detectFormat(filePath);

  if (!format) {
    throw new UnsupportedDocumentError(path.basename(filePath));
  }

  const raw = format === 'pdf'
    ? await readPdf(filePath)
    : { text: await fs.readFile(filePath, 'utf-8'), pages: 1 };

  const text = normalizeText(raw.text);

  if (!text) {
    throw new ExtractionError(`No text could be extracted from "${path.basename(filePath)}".`);
  }

  return {
    text,
    pages: raw.pages,
    format,
  };
};
