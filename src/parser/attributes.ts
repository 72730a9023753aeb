/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';

export interface ParsedStartTag {
  name: string;
  attributes: Array<[string, string]>;
}

/**
 * Parse a single start tag ('<w pos="NN" n=3>') with sax in loose mode:
 * lower-cased names, unquoted values allowed, entities in values resolved.
 * sax insists on proper nesting, so it only ever sees one tag at a time.
 * Returns undefined if sax does not recognise an opening tag.
 */
export function parseStartTag(raw: string): ParsedStartTag | undefined {
  const parser = sax.parser(false, { lowercase: true });
  let parsed: ParsedStartTag | undefined;

  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    if (parsed) return;
    const values: Record<string, string | sax.QualifiedAttribute> = tag.attributes;
    const attributes: Array<[string, string]> = [];
    for (const [name, value] of Object.entries(values)) {
      attributes.push([name, typeof value === 'string' ? value : value.value]);
    }
    parsed = { name: tag.name, attributes };
  };
  // Loose mode only reports trouble after the tag (e.g. an unclosed root);
  // the caller decides from `parsed` alone.
  parser.onerror = () => {
    parser.resume();
  };

  parser.write(raw).close();
  return parsed;
}
