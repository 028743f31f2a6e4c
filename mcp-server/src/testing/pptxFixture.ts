import JSZip from 'jszip';
import { escapeXml } from '../PptxTemplate';

const NS =
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" ' +
  'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships" ' +
  'xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main"';

let nextShapeId = 2;

/** One `a:p`: each string is a run; `null` is a line break. */
export type ParagraphRuns = Array<string | null>;

export function paragraphXml(runs: ParagraphRuns): string {
  const body = runs
    .map((run) => (run === null ? '<a:br><a:rPr lang="en-US"/></a:br>' : `<a:r><a:rPr lang="en-US" dirty="0"/><a:t>${escapeXml(run)}</a:t></a:r>`))
    .join('');
  return `<a:p>${body}</a:p>`;
}

export function textShape(name: string, paragraphs: ParagraphRuns[]): string {
  const id = nextShapeId++;
  return (
    `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="${escapeXml(name)}"/><p:cNvSpPr txBox="1"/><p:nvPr/></p:nvSpPr>` +
    '<p:spPr/>' +
    `<p:txBody><a:bodyPr/><a:lstStyle/>${paragraphs.map(paragraphXml).join('')}</p:txBody></p:sp>`
  );
}

export function pictureShape(name: string): string {
  const id = nextShapeId++;
  return `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="${escapeXml(name)}"/><p:cNvSpPr/><p:nvPr/></p:nvSpPr><p:spPr/></p:sp>`;
}

export function groupShape(name: string, children: string[]): string {
  const id = nextShapeId++;
  return (
    `<p:grpSp><p:nvGrpSpPr><p:cNvPr id="${id}" name="${escapeXml(name)}"/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
    `<p:grpSpPr/>${children.join('')}</p:grpSp>`
  );
}

export function slideXml(shapes: string[]): string {
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
    `<p:sld ${NS}><p:cSld><p:spTree>` +
    '<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>' +
    `${shapes.join('')}</p:spTree></p:cSld><p:clrMapOvr><a:masterClrMapping/></p:clrMapOvr></p:sld>`
  );
}

/**
 * Build a minimal PPTX package. `slides` are complete slide part XML strings,
 * listed in presentation order; `partNumbers` lets a test store them under
 * slideN.xml names that don't follow that order.
 */
export async function buildPptx(slides: string[], partNumbers?: number[]): Promise<Buffer> {
  const zip = new JSZip();
  const numbers = partNumbers ?? slides.map((_, index) => index + 1);

  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Override PartName="/ppt/presentation.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.presentation.main+xml"/>' +
      numbers
        .map(
          (n) =>
            `<Override PartName="/ppt/slides/slide${n}.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.slide+xml"/>`
        )
        .join('') +
      '</Types>'
  );

  zip.file(
    'ppt/presentation.xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
      `<p:presentation ${NS}><p:sldIdLst>` +
      numbers.map((_, index) => `<p:sldId id="${256 + index}" r:id="rId${index + 2}"/>`).join('') +
      '</p:sldIdLst><p:sldSz cx="12192000" cy="6858000"/></p:presentation>'
  );

  zip.file(
    'ppt/_rels/presentation.xml.rels',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
      '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/slideMaster" Target="slideMasters/slideMaster1.xml"/>' +
      numbers
        .map(
          (n, index) =>
            `<Relationship Id="rId${index + 2}" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide" Target="slides/slide${n}.xml"/>`
        )
        .join('') +
      '</Relationships>'
  );

  slides.forEach((xml, index) => {
    zip.file(`ppt/slides/slide${numbers[index]}.xml`, xml);
  });

  return zip.generateAsync({ type: 'nodebuffer' });
}

export async function readPart(data: Buffer, partName: string): Promise<string> {
  const zip = await JSZip.loadAsync(data);
  const file = zip.file(partName);
  if (!file) throw new Error(`Part ${partName} not found`);
  return file.async('string');
}
