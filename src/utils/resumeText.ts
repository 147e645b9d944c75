import fs from 'fs';
import mammoth from 'mammoth';

export class UnsupportedResumeTypeError extends Error {}

const extractPdfText = async (filePath: string) => {
  // Loaded on demand: pdf-parse is only needed when a PDF resume is analysed
  const { default: pdfParse } = await import('pdf-parse');
  const data = await pdfParse(await fs.promises.readFile(filePath));
  return data.text;
};

const extractWordText = async (filePath: string) => {
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value;
};

/**
 * Plain text of a stored resume. Unreadable documents give an empty string so
 * the analysis can still report that nothing was extracted.
 */
export const extractResumeText = async (filePath: string, extension: string): Promise<string> => {
  try {
    switch (extension) {
      case 'pdf':
        return await extractPdfText(filePath);
      case 'doc':
      case 'docx':
        return await extractWordText(filePath);
      case 'jpg':
      case 'jpeg':
        console.warn(`No OCR engine available, skipping text extraction for ${filePath}`);
        return '';
      default:
        break;
    }
  } catch (error) {
    console.error(`Error extracting text from ${extension.toUpperCase()} resume:`, error);
    return '';
  }
  throw new UnsupportedResumeTypeError(`Unsupported file type: ${extension || 'unknown'}`);
};
