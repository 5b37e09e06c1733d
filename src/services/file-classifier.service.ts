/**
 * File Classifier Service
 * Content-based file type detection for uploads
 *
 * The verdict comes from the leading bytes alone. Filenames and
 * client-supplied content-type headers are never consulted, so a renamed
 * executable is still an executable.
 *
 * GUARDRAILS:
 * - At most SNIFF_WINDOW_BYTES are inspected
 * - Rejections never reveal the detected type
 * - Pure: no I/O, no state
 */

import type { MimeType, Result, UploadAcceptance } from '../types/index.js';
import { success, failure } from '../types/index.js';

export const SNIFF_WINDOW_BYTES = 4096;

export const OCTET_STREAM = 'application/octet-stream';
export const TEXT_PLAIN = 'text/plain';

export const DEFAULT_ALLOWED_TYPES = [
  'image/png',
  'image/jpeg',
  'image/gif',
  'image/webp',
  'application/pdf',
  'text/plain',
] as const;

/**
 * A byte pattern at a fixed offset. null entries match any byte.
 */
interface Signature {
  mimeType: MimeType;
  offset: number;
  bytes: ReadonlyArray<number | null>;
}

function ascii(text: string): number[] {
  return Array.from(text, (ch) => ch.charCodeAt(0));
}

// Order matters: the first match wins
const SIGNATURES: readonly Signature[] = [
  {
    mimeType: 'image/png',
    offset: 0,
    bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
  },
  { mimeType: 'image/jpeg', offset: 0, bytes: [0xff, 0xd8, 0xff] },
  { mimeType: 'image/gif', offset: 0, bytes: ascii('GIF87a') },
  { mimeType: 'image/gif', offset: 0, bytes: ascii('GIF89a') },
  {
    mimeType: 'image/webp',
    offset: 0,
    bytes: [...ascii('RIFF'), null, null, null, null, ...ascii('WEBP')],
  },
  { mimeType: 'application/pdf', offset: 0, bytes: ascii('%PDF-') },
  { mimeType: 'application/zip', offset: 0, bytes: [0x50, 0x4b, 0x03, 0x04] },
  { mimeType: 'application/zip', offset: 0, bytes: [0x50, 0x4b, 0x05, 0x06] },
  { mimeType: 'application/gzip', offset: 0, bytes: [0x1f, 0x8b, 0x08] },
  { mimeType: 'application/x-msdownload', offset: 0, bytes: ascii('MZ') },
  {
    mimeType: 'application/x-elf',
    offset: 0,
    bytes: [0x7f, 0x45, 0x4c, 0x46],
  },
  // Mach-O 32/64-bit in both byte orders, then universal binaries
  {
    mimeType: 'application/x-mach-binary',
    offset: 0,
    bytes: [0xfe, 0xed, 0xfa, 0xce],
  },
  {
    mimeType: 'application/x-mach-binary',
    offset: 0,
    bytes: [0xfe, 0xed, 0xfa, 0xcf],
  },
  {
    mimeType: 'application/x-mach-binary',
    offset: 0,
    bytes: [0xce, 0xfa, 0xed, 0xfe],
  },
  {
    mimeType: 'application/x-mach-binary',
    offset: 0,
    bytes: [0xcf, 0xfa, 0xed, 0xfe],
  },
  {
    mimeType: 'application/x-mach-binary',
    offset: 0,
    bytes: [0xca, 0xfe, 0xba, 0xbe],
  },
  { mimeType: 'text/x-shellscript', offset: 0, bytes: ascii('#!') },
];

function matches(window: Uint8Array, signature: Signature): boolean {
  if (window.length < signature.offset + signature.bytes.length) {
    return false;
  }
  return signature.bytes.every(
    (expected, index) =>
      expected === null || window[signature.offset + index] === expected
  );
}

/**
 * Control characters other than tab, LF, VT, FF, CR and ESC
 */
function isBinaryControl(byte: number): boolean {
  return (
    byte <= 0x08 ||
    (byte >= 0x0e && byte <= 0x1a) ||
    (byte >= 0x1c && byte <= 0x1f)
  );
}

/**
 * A multi-byte sequence cut off at the end is tolerated only when the
 * window ends before the payload does
 */
function looksLikeText(window: Uint8Array, truncated: boolean): boolean {
  if (window.length === 0) {
    return false;
  }
  if (window.some(isBinaryControl)) {
    return false;
  }
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(window, {
      stream: truncated,
    });
    return true;
  } catch {
    return false;
  }
}

/**
 * Detect the MIME type of a payload from its leading bytes
 */
export function detectMimeType(bytes: Uint8Array): MimeType {
  const window = bytes.subarray(0, SNIFF_WINDOW_BYTES);

  for (const signature of SIGNATURES) {
    if (matches(window, signature)) {
      return signature.mimeType;
    }
  }

  return looksLikeText(window, bytes.length > window.length)
    ? TEXT_PLAIN
    : OCTET_STREAM;
}

/**
 * FileClassifier interface
 */
export interface FileClassifier {
  classify(bytes: Uint8Array): Result<MimeType>;
  validateUpload(
    bytes: Uint8Array,
    declaredName: string
  ): Result<UploadAcceptance>;
  readonly allowedTypes: readonly MimeType[];
}

/**
 * Create FileClassifier instance bound to an allow-list
 */
export function createFileClassifier(config: {
  allowedTypes: readonly MimeType[];
}): FileClassifier {
  const allowed = new Set(config.allowedTypes.map((t) => t.toLowerCase()));

  function classify(bytes: Uint8Array): Result<MimeType> {
    const mimeType = detectMimeType(bytes);
    if (!allowed.has(mimeType)) {
      return failure('UNSUPPORTED_TYPE', 'File type is not allowed');
    }
    return success(mimeType);
  }

  return {
    allowedTypes: [...allowed],

    classify,

    /**
     * declaredName is accepted for the caller's convenience only
     */
    validateUpload(
      bytes: Uint8Array,
      _declaredName: string
    ): Result<UploadAcceptance> {
      const result = classify(bytes);
      if (!result.success) {
        return result;
      }
      return success({ accepted: result.data });
    },
  };
}
