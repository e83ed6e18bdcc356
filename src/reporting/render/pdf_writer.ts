/**
 * Multi-page PDF: an A4 portrait cover followed by one A4 landscape table
 * per group. Long groups continue on extra pages with the header repeated.
 */
import { createWriteStream } from "node:fs";
import { rm } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import PDFDocument from "pdfkit";
import type { PivotGroup } from "@src/market/types";
import { REPORT_SUBTITLE, REPORT_TITLE } from "../constants";
import {
  ROW_COLUMNS,
  formatTimestamp,
  groupLabel,
  rowCells,
} from "./table";

const ROW_HEIGHT = 20;
const CELL_PADDING = 4;
const FONT_SIZE = 10;

export interface PdfReportOptions {
  generatedAt: Date;
}

// Standard PDF fonts are WinAnsi-encoded and have no U+2212 glyph
function pdfText(text: string): string {
  return text.replace(/−/g, "-");
}

function drawCover(doc: PDFKit.PDFDocument, generatedAt: Date): void {
  const { left, right } = doc.page.margins;
  const width = doc.page.width - left - right;
  const height = doc.page.height;

  doc
    .font("Helvetica-Bold")
    .fontSize(22)
    .text(pdfText(REPORT_TITLE), left, height * 0.25, {
      width,
      align: "center",
    });
  doc
    .font("Helvetica")
    .fontSize(11)
    .text(pdfText(REPORT_SUBTITLE), left, height * 0.32, {
      width,
      align: "center",
    });
  doc
    .fontSize(10)
    .text(`Generated: ${formatTimestamp(generatedAt)}`, left, height * 0.38, {
      width,
      align: "center",
    });
}

function addTablePage(doc: PDFKit.PDFDocument): void {
  doc.addPage({ size: "A4", layout: "landscape", margin: 36 });
}

function drawHeaderRow(doc: PDFKit.PDFDocument, y: number): number {
  const { left, right } = doc.page.margins;
  const width = doc.page.width - left - right;
  const colWidth = width / ROW_COLUMNS.length;

  doc.rect(left, y, width, ROW_HEIGHT).fill("#f2f2f2");
  doc.fillColor("#000000").font("Helvetica-Bold").fontSize(FONT_SIZE);
  ROW_COLUMNS.forEach((column, i) => {
    doc.text(pdfText(column), left + i * colWidth + CELL_PADDING, y + 6, {
      width: colWidth - 2 * CELL_PADDING,
      lineBreak: false,
    });
  });
  return y + ROW_HEIGHT;
}

function drawGroup(doc: PDFKit.PDFDocument, group: PivotGroup): void {
  addTablePage(doc);
  const { left, right, top, bottom } = doc.page.margins;
  const width = doc.page.width - left - right;
  const colWidth = width / ROW_COLUMNS.length;
  const maxY = doc.page.height - bottom;

  doc
    .fillColor("#000000")
    .font("Helvetica-Bold")
    .fontSize(16)
    .text(pdfText(groupLabel(group.seed)), left, top);
  let y = drawHeaderRow(doc, doc.y + 12);

  for (const row of group.rows) {
    if (y + ROW_HEIGHT > maxY) {
      addTablePage(doc);
      y = drawHeaderRow(doc, top);
    }
    const cells = rowCells(row);
    doc.fillColor("#000000").font("Helvetica").fontSize(FONT_SIZE);
    ROW_COLUMNS.forEach((column, i) => {
      doc.text(cells[column], left + i * colWidth + CELL_PADDING, y + 6, {
        width: colWidth - 2 * CELL_PADDING,
        lineBreak: false,
      });
    });
    y += ROW_HEIGHT;
    doc
      .moveTo(left, y)
      .lineTo(left + width, y)
      .lineWidth(0.5)
      .strokeColor("#dddddd")
      .stroke();
  }
}

export async function writePdf(
  path: string,
  groups: readonly PivotGroup[],
  options: PdfReportOptions
): Promise<void> {
  const doc = new PDFDocument({
    size: "A4",
    layout: "portrait",
    margin: 56,
    info: { Title: REPORT_TITLE, CreationDate: options.generatedAt },
  });
  const out = createWriteStream(path);
  const done = pipeline(doc, out);

  try {
    drawCover(doc, options.generatedAt);
    for (const group of groups) {
      drawGroup(doc, group);
    }
    doc.end();
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    out.destroy(cause);
    // pipeline rejects with the same cause once both streams are torn down
    await done.catch(() => undefined);
    await rm(path, { force: true });
    throw cause;
  }

  await done;
}
