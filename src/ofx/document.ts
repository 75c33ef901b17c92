import { DOMImplementation, XMLSerializer } from '@xmldom/xmldom';
import fs from 'fs-extra';
import { AccountSelector } from '../types';
import { classifyError } from '../utils/errors';
import { OfxFormatter, OfxFormatterOptions } from './formatter';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="no"?>';
export const OFX_HEADER = 'OFXHEADER="200" VERSION="211" SECURITY="NONE" OLDFILEUID="NONE" NEWFILEUID="NONE"';

export interface OfxExportResult {
  xml: string;
  statementCount: number;
}

/**
 * A new document with the OFX header processing instruction and an empty OFX root
 */
export function createOfxDocument(): Document {
  const doc = new DOMImplementation().createDocument(null, 'OFX', null);
  doc.insertBefore(doc.createProcessingInstruction('OFX', OFX_HEADER), doc.documentElement);
  return doc;
}

export function serializeOfx(doc: Document): string {
  return `${XML_DECLARATION}${new XMLSerializer().serializeToString(doc)}`;
}

export function exportOfx(selector: AccountSelector, options: OfxFormatterOptions = {}): OfxExportResult {
  const doc = createOfxDocument();
  new OfxFormatter(selector, options).toXml(doc, doc.documentElement);
  return {
    xml: serializeOfx(doc),
    statementCount: doc.getElementsByTagName('STMTRS').length,
  };
}

export function writeOfxFile(filePath: string, xml: string): void {
  try {
    fs.outputFileSync(filePath, xml, 'utf8');
  } catch (error: unknown) {
    throw classifyError(error, { filePath });
  }
}
