/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Header metadata: the header element is excluded from the text, but when
  it is well-formed XML its content can be kept as flat 'path value'
  records, e.g. 'teiheader.filedesc.title Demo' or 'teiheader.text@lang sv'.
*/

import { XMLParser, XMLValidator } from 'fast-xml-parser';

const ATTRIBUTE_PREFIX = '@';
const TEXT_NODE = '#text';

export type HeaderMetadataResult =
  | { ok: true; entries: Array<[string, string]> }
  | { ok: false; message: string; line: number };

function flatten(node: unknown, path: string, out: Array<[string, string]>): void {
  if (typeof node === 'string' || typeof node === 'number' || typeof node === 'boolean') {
    out.push([path, String(node)]);
  } else if (Array.isArray(node)) {
    node.forEach((child: unknown, i) => flatten(child, `${path}.${i}`, out));
  } else if (typeof node === 'object' && node !== null) {
    for (const [key, child] of Object.entries(node)) {
      if (key === TEXT_NODE) out.push([path, String(child)]);
      else if (key.startsWith(ATTRIBUTE_PREFIX)) out.push([path + key, String(child)]);
      else flatten(child, path ? `${path}.${key}` : key, out);
    }
  }
}

export function extractHeaderMetadata(xml: string): HeaderMetadataResult {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) return { ok: false, message: valid.err.msg, line: valid.err.line };

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_NODE,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
  });
  const tree: unknown = parser.parse(xml);
  const entries: Array<[string, string]> = [];
  flatten(tree, '', entries);
  return { ok: true, entries };
}
