import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import mammoth from 'mammoth';
import * as XLSX from 'xlsx';

export type InputKind = 'pdf' | 'image' | 'text' | 'spreadsheet' | 'document';

export interface InputDescriptor {
  kind: InputKind;
  /** MIME type of what gets uploaded; converted inputs upload as text. */
  mimeType: string;
}

const INPUT_TYPES: Record<string, InputDescriptor> = {
  '.pdf': { kind: 'pdf', mimeType: 'application/pdf' },
  '.png': { kind: 'image', mimeType: 'image/png' },
  '.jpg': { kind: 'image', mimeType: 'image/jpeg' },
  '.jpeg': { kind: 'image', mimeType: 'image/jpeg' },
  '.webp': { kind: 'image', mimeType: 'image/webp' },
  '.heic': { kind: 'image', mimeType: 'image/heic' },
  '.heif': { kind: 'image', mimeType: 'image/heif' },
  '.csv': { kind: 'text', mimeType: 'text/csv' },
  '.tsv': { kind: 'text', mimeType: 'text/plain' },
  '.txt': { kind: 'text', mimeType: 'text/plain' },
  '.md': { kind: 'text', mimeType: 'text/markdown' },
  '.xlsx': { kind: 'spreadsheet', mimeType: 'text/plain' },
  '.xlsm': { kind: 'spreadsheet', mimeType: 'text/plain' },
  '.xls': { kind: 'spreadsheet', mimeType: 'text/plain' },
  '.ods': { kind: 'spreadsheet', mimeType: 'text/plain' },
  '.docx': { kind: 'document', mimeType: 'text/plain' },
};

export const SUPPORTED_EXTENSIONS = Object.keys(INPUT_TYPES);

export function detectInputKind(filePath: string): InputDescriptor | null {
  return INPUT_TYPES[path.extname(filePath).toLowerCase()] ?? null;
}

export interface PreparedInput {
  sourcePath: string;
  uploadPath: string;
  mimeType: string;
  displayName: string;
  /** Local paths created during preparation; removed when the input is released. */
  artifacts: string[];
}

export function renderWorkbook(workbook: XLSX.WorkBook): string {
  const sections: string[] = [];
  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;
    const csv = XLSX.utils.sheet_to_csv(sheet);
    sections.push(`--- Sheet: ${sheetName} ---\n${csv}`);
  }
  return sections.join('\n\n');
}

async function renderSpreadsheet(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  return renderWorkbook(XLSX.read(buffer, { type: 'buffer' }));
}

async function renderDocument(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
}

async function writeRendering(sourcePath: string, text: string): Promise<{ uploadPath: string; dir: string }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'enzyme-extract-'));
  const uploadPath = path.join(dir, `${path.parse(sourcePath).name}.txt`);
  try {
    await fs.writeFile(uploadPath, text, 'utf-8');
  } catch (error) {
    await fs.rm(dir, { recursive: true, force: true });
    throw error;
  }
  return { uploadPath, dir };
}

/**
 * Resolves what to upload for a local file. Spreadsheets and DOCX documents
 * are rendered to text in a temp directory first; that directory is reported
 * in `artifacts`.
 */
export async function prepareInput(filePath: string): Promise<PreparedInput> {
  const descriptor = detectInputKind(filePath);
  if (!descriptor) {
    throw new Error(
      `Unsupported file type: ${path.extname(filePath) || '(none)'}. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  const displayName = path.basename(filePath);

  if (descriptor.kind === 'spreadsheet' || descriptor.kind === 'document') {
    const text =
      descriptor.kind === 'spreadsheet'
        ? await renderSpreadsheet(filePath)
        : await renderDocument(filePath);
    const { uploadPath, dir } = await writeRendering(filePath, text);
    return {
      sourcePath: filePath,
      uploadPath,
      mimeType: descriptor.mimeType,
      displayName,
      artifacts: [dir],
    };
  }

  await fs.access(filePath);
  return {
    sourcePath: filePath,
    uploadPath: filePath,
    mimeType: descriptor.mimeType,
    displayName,
    artifacts: [],
  };
}
