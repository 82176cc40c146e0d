// ============================================================================
// Provider Attestation — Document Content & PDF Rendering
// ============================================================================

import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from 'pdf-lib';
import {
  ATTESTATION_DOCUMENT_TITLE,
  ATTESTATION_STATEMENT,
  ATTESTATION_DOCUMENT_FOOTER,
} from '@claim-scrub/shared/constants/attestation.constants.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AttestationDocumentInput {
  claimId: string;
  providerName: string;
  patientId: string;
  dateOfService: string;
  diagnosisCode?: string | null;
  procedureCode: string;
  issues: readonly string[];
  signature?: {
    signerName: string;
    signedAt: Date;
  } | null;
}

export interface AttestationDocument {
  title: string;
  fields: Array<{ label: string; value: string }>;
  issues: string[];
  statement: string;
  signatureLines: string[];
  footer: string;
}

/** Renders attestation documents to printable bytes. */
export interface AttestationRenderer {
  render(document: AttestationDocument): Promise<Uint8Array>;
}

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

/** ISO-8601 UTC to the second, e.g. 2026-03-01T14:30:00Z. */
export function formatSignatureTimestamp(at: Date): string {
  return at.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function buildAttestationDocument(
  input: AttestationDocumentInput,
): AttestationDocument {
  const signatureLines = input.signature
    ? [
        'Provider Signature (electronic)',
        `Electronically signed by ${input.signature.signerName} on ${formatSignatureTimestamp(input.signature.signedAt)}`,
      ]
    : ['Provider Signature: ______________________________', 'Date: ________________'];

  return {
    title: ATTESTATION_DOCUMENT_TITLE,
    fields: [
      { label: 'Claim ID', value: input.claimId },
      { label: 'Provider', value: input.providerName },
      { label: 'Patient ID', value: input.patientId },
      { label: 'Service Date', value: input.dateOfService },
      { label: 'ICD-10', value: input.diagnosisCode || 'N/A' },
      { label: 'Procedure Code', value: input.procedureCode },
    ],
    issues: [...input.issues],
    statement: ATTESTATION_STATEMENT,
    signatureLines,
    footer: ATTESTATION_DOCUMENT_FOOTER,
  };
}

/**
 * Archive entry name for a claim's attestation. Provider names keep
 * letters, digits, spaces, "-" and "_"; spaces become underscores.
 */
export function attestationFileName(claimId: string, providerName: string): string {
  const safeProvider = providerName
    .replace(/[^A-Za-z0-9 _-]/g, '')
    .trim()
    .replace(/ /g, '_');
  const safeClaimId = claimId.replace(/[^A-Za-z0-9_-]/g, '');
  return `Claim_${safeClaimId}_${safeProvider}.pdf`;
}

// ---------------------------------------------------------------------------
// PDF rendering (pdf-lib)
// ---------------------------------------------------------------------------

const PAGE_SIZE: [number, number] = [612, 792]; // US Letter
const MARGIN = 72;
const BODY_SIZE = 11;
const LINE_GAP = 4;

// Standard fonts only encode WinAnsi; anything else is replaced.
function toWinAnsi(text: string): string {
  return text.replace(/[^\x20-\x7E\xA0-\xFF–—‘’“”•…]/g, '?');
}

function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = current ? `${current} ${word}` : word;
    if (current && font.widthOfTextAtSize(candidate, size) > maxWidth) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) lines.push(current);
  return lines;
}

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
  italic: PDFFont;
}

/** Top-to-bottom text cursor that starts a new page when the current one fills. */
class PageWriter {
  private page: PDFPage;
  private y: number;

  constructor(
    private readonly pdf: PDFDocument,
    private readonly fonts: Fonts,
  ) {
    this.page = pdf.addPage(PAGE_SIZE);
    this.y = PAGE_SIZE[1] - MARGIN;
  }

  private get width(): number {
    return PAGE_SIZE[0] - MARGIN * 2;
  }

  private ensureSpace(height: number): void {
    if (this.y - height < MARGIN) {
      this.page = this.pdf.addPage(PAGE_SIZE);
      this.y = PAGE_SIZE[1] - MARGIN;
    }
  }

  text(value: string, opts: { font?: PDFFont; size?: number; indent?: number } = {}): void {
    const font = opts.font ?? this.fonts.regular;
    const size = opts.size ?? BODY_SIZE;
    const indent = opts.indent ?? 0;
    for (const line of wrapText(toWinAnsi(value), font, size, this.width - indent)) {
      this.ensureSpace(size + LINE_GAP);
      this.y -= size;
      this.page.drawText(line, {
        x: MARGIN + indent,
        y: this.y,
        size,
        font,
        color: rgb(0, 0, 0),
      });
      this.y -= LINE_GAP;
    }
  }

  gap(height = BODY_SIZE): void {
    this.y -= height;
  }

  footer(value: string): void {
    const size = 8;
    const line = toWinAnsi(value);
    for (const page of this.pdf.getPages()) {
      page.drawText(line, {
        x: MARGIN,
        y: MARGIN / 2,
        size,
        font: this.fonts.italic,
        color: rgb(0.4, 0.4, 0.4),
      });
    }
  }
}

export async function renderAttestationPdf(document: AttestationDocument): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  pdf.setTitle(document.title);

  const fonts: Fonts = {
    regular: await pdf.embedFont(StandardFonts.Helvetica),
    bold: await pdf.embedFont(StandardFonts.HelveticaBold),
    italic: await pdf.embedFont(StandardFonts.HelveticaOblique),
  };
  const writer = new PageWriter(pdf, fonts);

  writer.text(document.title, { font: fonts.bold, size: 16 });
  writer.gap();

  writer.text('Claim Information', { font: fonts.bold, size: 12 });
  for (const field of document.fields) {
    writer.text(`${field.label}: ${field.value}`, { indent: 12 });
  }
  writer.gap();

  if (document.issues.length > 0) {
    writer.text('Compliance Issues Identified', { font: fonts.bold, size: 12 });
    document.issues.forEach((issue, index) => {
      writer.text(`${index + 1}. ${issue}`, { indent: 12 });
    });
    writer.gap();
  }

  writer.text('Provider Attestation', { font: fonts.bold, size: 12 });
  writer.text(document.statement);
  writer.gap(BODY_SIZE * 2);

  for (const line of document.signatureLines) {
    writer.text(line);
    writer.gap(LINE_GAP);
  }

  writer.footer(document.footer);

  return pdf.save();
}

export function createPdfAttestationRenderer(): AttestationRenderer {
  return { render: renderAttestationPdf };
}
