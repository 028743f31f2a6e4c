import JSZip from 'jszip';
import { TemplateError } from './errors';
import { createLogger } from './logger';
import type { RewriteStats, TemplateValues } from './types';

const log = createLogger('template');

export const COMPANY_PLACEHOLDER = '<Company>';
export const TIER_PLACEHOLDER = '<Tier>';
const VALID_THROUGH_MARKER = 'Valid through';
const DATE_MARKER = '31 December';
const DATE_PATTERN = /31 December \d{4}/g;

const PRESENTATION_PART = 'ppt/presentation.xml';
const PRESENTATION_RELS_PART = 'ppt/_rels/presentation.xml.rels';
const SLIDE_PART_PATTERN = /^ppt\/slides\/slide(\d+)\.xml$/;

// Comments, processing instructions and CDATA are matched first so their
// contents never look like tags. Attribute values may legally contain '>'.
const TOKEN_PATTERN =
  /<!--[\s\S]*?-->|<\?[\s\S]*?\?>|<!\[CDATA\[[\s\S]*?\]\]>|<!DOCTYPE[^>]*>|<(\/?)([^\s/>]+)((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>/g;

/** Where a run's text lives in the slide XML. */
export interface TextLocation {
  start: number;
  end: number;
  /** `<a:t/>`: start/end cover the whole tag instead of its content */
  selfClosing: boolean;
}

export class PptxRun {
  private _text: string;
  readonly originalText: string;

  constructor(text: string, readonly location: TextLocation | null) {
    this._text = text;
    this.originalText = text;
  }

  get text(): string {
    return this._text;
  }

  set text(value: string) {
    if (value !== this._text && !this.location) {
      throw new TemplateError('Cannot set text on a run without an <a:t> element');
    }
    this._text = value;
  }

  get isModified(): boolean {
    return this._text !== this.originalText;
  }
}

type ParagraphSegment = PptxRun | string;

export class PptxParagraph {
  /** Runs, plus line breaks ('\v') and field text as plain strings, in document order */
  readonly segments: ParagraphSegment[] = [];

  get runs(): PptxRun[] {
    return this.segments.filter((segment): segment is PptxRun => segment instanceof PptxRun);
  }

  get text(): string {
    return this.segments.map((segment) => (typeof segment === 'string' ? segment : segment.text)).join('');
  }
}

export class PptxShape {
  hasTextFrame = false;
  readonly paragraphs: PptxParagraph[] = [];

  constructor(readonly name: string) {}

  get text(): string {
    return this.paragraphs.map((paragraph) => paragraph.text).join('\n');
  }
}

export interface PptxSlide {
  index: number;
  partName: string;
  shapes: PptxShape[];
}

interface LoadedSlide extends PptxSlide {
  xml: string;
}

export interface RunEditContext {
  slide: PptxSlide;
  shape: PptxShape;
  paragraph: PptxParagraph;
  run: PptxRun;
}

export class PptxTemplate {
  private _zip: JSZip;
  private _slides: LoadedSlide[];

  private constructor(zip: JSZip, slides: LoadedSlide[]) {
    this._zip = zip;
    this._slides = slides;
  }

  public static async createFromBuffer(data: Buffer | Uint8Array): Promise<PptxTemplate> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (error) {
      throw new TemplateError(`Cannot open presentation: ${errorMessage(error)}`, { cause: error });
    }

    if (!zip.file(PRESENTATION_PART)) {
      throw new TemplateError(`Not a presentation: ${PRESENTATION_PART} is missing`);
    }

    const partNames = await PptxTemplate.orderedSlideParts(zip);
    const slides: LoadedSlide[] = [];
    for (const [index, partName] of partNames.entries()) {
      const file = zip.file(partName);
      if (!file) {
        throw new TemplateError(`Slide part ${partName} is missing`);
      }
      const xml = await file.async('string');
      slides.push({ index, partName, xml, shapes: parseSlideShapes(xml, partName) });
    }

    return new PptxTemplate(zip, slides);
  }

  /**
   * Slide parts in presentation order (p:sldIdLst), falling back to the
   * numeric order of ppt/slides/slideN.xml when the list can't be resolved.
   */
  private static async orderedSlideParts(zip: JSZip): Promise<string[]> {
    const fallback = Object.keys(zip.files)
      .map((name) => ({ name, match: SLIDE_PART_PATTERN.exec(name) }))
      .filter((entry) => entry.match !== null)
      .sort((a, b) => Number(a.match?.[1]) - Number(b.match?.[1]))
      .map((entry) => entry.name);

    const presentationFile = zip.file(PRESENTATION_PART);
    const relsFile = zip.file(PRESENTATION_RELS_PART);
    if (!presentationFile || !relsFile) return fallback;

    const presentationXml = await presentationFile.async('string');
    const relsXml = await relsFile.async('string');

    const targets = new Map<string, string>();
    for (const attrs of elementAttributes(relsXml, 'Relationship')) {
      const id = attrs.get('Id');
      const target = attrs.get('Target');
      if (id && target && attrs.get('TargetMode') !== 'External') {
        targets.set(id, resolvePartName('ppt', target));
      }
    }

    const ordered: string[] = [];
    for (const attrs of elementAttributes(presentationXml, 'p:sldId')) {
      const relId = attrs.get('r:id');
      const partName = relId ? targets.get(relId) : undefined;
      if (!partName || !zip.file(partName)) return fallback;
      ordered.push(partName);
    }
    return ordered.length > 0 ? ordered : fallback;
  }

  getSlides(): readonly PptxSlide[] {
    return this._slides;
  }

  getAllText(): string {
    return this._slides
      .map((slide) =>
        slide.shapes
          .filter((shape) => shape.hasTextFrame)
          .map((shape) => shape.text)
          .join('\n')
      )
      .join('\n\n');
  }

  /**
   * Visit every run of every text-bearing shape in document order and set its
   * text to whatever `edit` returns. Returns the number of runs that changed.
   */
  editRuns(edit: (context: RunEditContext) => string): number {
    let changed = 0;
    for (const slide of this._slides) {
      for (const shape of slide.shapes) {
        if (!shape.hasTextFrame) continue;
        for (const paragraph of shape.paragraphs) {
          for (const run of paragraph.runs) {
            const before = run.text;
            const next = edit({ slide, shape, paragraph, run });
            run.text = next;
            if (next !== before) changed++;
          }
        }
      }
    }
    return changed;
  }

  /**
   * Fill the certificate placeholders. Matching is literal, case-sensitive and
   * per run: a placeholder split across runs is left alone.
   */
  applyCertificateValues(values: TemplateValues): number {
    const validThrough = `${DATE_MARKER} ${values.today.getFullYear()}`;
    log.info(`Modifying template: Company=${values.companyName}, Tier=${values.tier}, Valid through=${validThrough}`);

    return this.editRuns(({ shape, run }) => {
      let text = run.text;

      if (text.includes(COMPANY_PLACEHOLDER)) {
        text = text.replaceAll(COMPANY_PLACEHOLDER, () => values.companyName);
        log.debug(`Replaced ${COMPANY_PLACEHOLDER} with ${values.companyName}`);
      }
      if (text.includes(TIER_PLACEHOLDER)) {
        text = text.replaceAll(TIER_PLACEHOLDER, () => values.tier);
        log.debug(`Replaced ${TIER_PLACEHOLDER} with ${values.tier}`);
      }

      // The shape text must reflect the substitutions above
      run.text = text;
      if (text.includes(DATE_MARKER) && shape.text.includes(VALID_THROUGH_MARKER)) {
        const updated = text.replace(DATE_PATTERN, validThrough);
        if (updated !== text) log.debug(`Updated Valid through date to ${validThrough}`);
        text = updated;
      }
      return text;
    });
  }

  async save(): Promise<Buffer> {
    for (const slide of this._slides) {
      const xml = spliceRunText(slide);
      if (xml !== slide.xml) {
        this._zip.file(slide.partName, xml);
      }
    }

    try {
      return await this._zip.generateAsync({
        type: 'nodebuffer',
        compression: 'DEFLATE',
        compressionOptions: { level: 6 },
      });
    } catch (error) {
      throw new TemplateError(`Cannot serialize presentation: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Parse, fill and re-serialize a certificate template in one go.
 * Never falls back to the input bytes: any failure is a TemplateError.
 */
export async function rewriteCertificate(
  data: Buffer | Uint8Array,
  values: TemplateValues
): Promise<{ content: Buffer; stats: RewriteStats }> {
  const template = await PptxTemplate.createFromBuffer(data);
  const runsChanged = template.applyCertificateValues(values);
  const content = await template.save();

  const slides = template.getSlides();
  const stats: RewriteStats = {
    slides: slides.length,
    shapes: slides.reduce((sum, slide) => sum + slide.shapes.filter((shape) => shape.hasTextFrame).length, 0),
    runsChanged,
  };
  log.info(`Successfully modified PowerPoint template (${content.length} bytes, ${runsChanged} run(s) changed)`);
  return { content, stats };
}

// ============================================================
// XML helpers
// ============================================================

/**
 * Build the shape/paragraph/run model of one slide. Only shapes that sit
 * directly in the slide's shape tree are read; group members, graphic frames
 * and connectors have no text frame of their own.
 */
function parseSlideShapes(xml: string, partName: string): PptxShape[] {
  const shapes: PptxShape[] = [];
  const stack: string[] = [];

  let shape: PptxShape | null = null;
  let shapeDepth = -1;
  let paragraph: PptxParagraph | null = null;
  let run: { location: TextLocation | null; text: string } | null = null;
  let field: { text: string } | null = null;
  let textStart = -1;

  TOKEN_PATTERN.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = TOKEN_PATTERN.exec(xml)) !== null) {
    const [token, closing, name, , selfClosing] = match;
    if (name === undefined) continue;

    const parent = stack[stack.length - 1];
    const tokenEnd = match.index + token.length;

    if (closing) {
      if (parent !== name) {
        throw new TemplateError(`Malformed XML in ${partName}: expected </${parent ?? '(none)'}> but found </${name}>`);
      }
      stack.pop();

      if (name === 'a:t' && textStart >= 0) {
        const text = decodeXmlText(xml.substring(textStart, match.index));
        if (run) {
          run.text = text;
          run.location = { start: textStart, end: match.index, selfClosing: false };
        } else if (field) {
          field.text = text;
        }
        textStart = -1;
      } else if (name === 'a:r' && run && paragraph) {
        paragraph.segments.push(new PptxRun(run.text, run.location));
        run = null;
      } else if (name === 'a:fld' && field && paragraph) {
        paragraph.segments.push(field.text);
        field = null;
      } else if (name === 'a:p' && paragraph && shape) {
        shape.paragraphs.push(paragraph);
        paragraph = null;
      } else if (name === 'p:sp' && shape && stack.length === shapeDepth) {
        shapes.push(shape);
        shape = null;
        shapeDepth = -1;
      }
      continue;
    }

    const inTextBody = shape !== null && stack[shapeDepth + 1] === 'p:txBody';

    if (selfClosing) {
      if (name === 'a:br' && paragraph && parent === 'a:p') {
        paragraph.segments.push('\v');
      } else if (name === 'a:t' && run && parent === 'a:r') {
        run.location = { start: match.index, end: tokenEnd, selfClosing: true };
      }
      continue;
    }

    if (name === 'p:sp' && parent === 'p:spTree' && !shape) {
      shape = new PptxShape(shapeName(xml, tokenEnd));
      shapeDepth = stack.length;
    } else if (name === 'p:txBody' && shape && stack.length === shapeDepth + 1) {
      shape.hasTextFrame = true;
    } else if (name === 'a:p' && inTextBody && parent === 'p:txBody') {
      paragraph = new PptxParagraph();
    } else if (name === 'a:r' && paragraph && parent === 'a:p') {
      run = { location: null, text: '' };
    } else if (name === 'a:br' && paragraph && parent === 'a:p') {
      paragraph.segments.push('\v');
    } else if (name === 'a:fld' && paragraph && parent === 'a:p') {
      field = { text: '' };
    } else if (name === 'a:t' && (parent === 'a:r' || parent === 'a:fld')) {
      textStart = tokenEnd;
    }
    stack.push(name);
  }

  if (stack.length > 0) {
    throw new TemplateError(`Malformed XML in ${partName}: <${stack[stack.length - 1]}> is never closed`);
  }
  return shapes;
}

function shapeName(xml: string, from: number): string {
  const cNvPr = /<p:cNvPr\b((?:[^>"']|"[^"]*"|'[^']*')*)>/.exec(xml.substring(from, from + 2000));
  return cNvPr ? parseAttributes(cNvPr[1] ?? '').get('name') ?? '' : '';
}

/** Write modified run text back into the slide XML, leaving every other byte as it was. */
function spliceRunText(slide: LoadedSlide): string {
  const edits: Array<{ location: TextLocation; text: string }> = [];
  for (const shape of slide.shapes) {
    for (const paragraph of shape.paragraphs) {
      for (const run of paragraph.runs) {
        if (run.isModified && run.location) {
          edits.push({ location: run.location, text: run.text });
        }
      }
    }
  }
  if (edits.length === 0) return slide.xml;

  edits.sort((a, b) => b.location.start - a.location.start);
  let xml = slide.xml;
  for (const { location, text } of edits) {
    const replacement = location.selfClosing ? `<a:t>${escapeXml(text)}</a:t>` : escapeXml(text);
    xml = xml.substring(0, location.start) + replacement + xml.substring(location.end);
  }
  return xml;
}

function elementAttributes(xml: string, elementName: string): Array<Map<string, string>> {
  const pattern = new RegExp(`<${elementName}\\b((?:[^>"']|"[^"]*"|'[^']*')*?)\\/?>`, 'g');
  const result: Array<Map<string, string>> = [];
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(xml)) !== null) {
    result.push(parseAttributes(match[1] ?? ''));
  }
  return result;
}

function parseAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  const pattern = /([^\s=]+)\s*=\s*("([^"]*)"|'([^']*)')/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(source)) !== null) {
    const [, key, , doubleQuoted, singleQuoted] = match;
    if (key) attributes.set(key, decodeXmlText(doubleQuoted ?? singleQuoted ?? ''));
  }
  return attributes;
}

/** Resolve a relationship target against the directory of its source part. */
function resolvePartName(baseDir: string, target: string): string {
  const segments = target.startsWith('/') ? [] : baseDir.split('/');
  for (const segment of target.replace(/^\//, '').split('/')) {
    if (segment === '..') segments.pop();
    else if (segment !== '.' && segment !== '') segments.push(segment);
  }
  return segments.join('/');
}

export function decodeXmlText(text: string): string {
  return text.replace(
    /<!\[CDATA\[([\s\S]*?)\]\]>|&(#x[0-9a-fA-F]+|#[0-9]+|amp|lt|gt|quot|apos);/g,
    (whole, cdata: string | undefined, entity: string | undefined) => {
      if (cdata !== undefined) return cdata;
      switch (entity) {
        case 'amp': return '&';
        case 'lt': return '<';
        case 'gt': return '>';
        case 'quot': return '"';
        case 'apos': return "'";
        default:
          if (entity?.startsWith('#x')) return String.fromCodePoint(parseInt(entity.substring(2), 16));
          if (entity?.startsWith('#')) return String.fromCodePoint(parseInt(entity.substring(1), 10));
          return whole;
      }
    }
  );
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
