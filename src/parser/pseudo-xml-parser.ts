/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { AnchorStore } from '../anchors/anchor-store';
import { encodeEdge } from '../anchors/edge';
import { ReportContext, type SourceLocation } from '../common/report';
import { canOverlap, elementKey, type MarkupConfig } from './config';
import { resolveCharRef, resolveEntity } from './entities';
import { extractHeaderMetadata } from './header-metadata';
import { lexMarkup, type MarkupToken } from './lexer';
import type { OpenElement, ParsedDocument, ParserOptions } from './types';

/**
 * Between any two tokens an anchor point can be placed: runs of letters,
 * runs of digits, runs of spaces, then single characters.
 */
export const TEXT_TOKEN = /\p{L}+|\p{Nd}+| +|\s|./gsu;

const COMMENT_ELEMENT = 'comment';
const COMMENT_ATTRIBUTE = 'value';

/**
 * Parses one pseudo-XML document into anchored text and edge-keyed stores.
 * Elements may overlap: an end tag closes the most recently opened element
 * with its name, wherever that element sits among the open ones.
 */
export class PseudoXmlParser {
  private readonly config: MarkupConfig;
  private readonly anchors: AnchorStore;
  private readonly report: ReportContext;
  private readonly open: OpenElement[] = [];
  private readonly skipped: Set<string>;
  private readonly stores = new Map<string, Map<string, string>>();
  private readonly buffer: string[] = [];
  private position = 0;
  private insideHeader = false;
  private headerMarkup: string[] | undefined;
  private readonly headers: string[] = [];
  private location = { line: 1, column: 0 };
  private finished = false;

  constructor(config: MarkupConfig, options: ParserOptions) {
    this.config = config;
    this.anchors = new AnchorStore(options.prefix, options.seed, options.maxIdentifiers);
    this.report = options.report ?? new ReportContext(options.logger);
    this.skipped = new Set(config.skip);
    for (const store of config.stores) this.stores.set(store, new Map());
    if (config.headerStore !== undefined) this.stores.set(config.headerStore, new Map());
  }

  /** Parse a complete document and close it. */
  parse(source: string): ParsedDocument {
    const { tokens, end } = lexMarkup(source);
    for (const token of tokens) this.dispatch(token);
    this.location = { line: end.line, column: end.column };
    return this.finish();
  }

  private dispatch(token: MarkupToken): void {
    this.location = { line: token.line, column: token.column };
    if (this.headerMarkup && token.type !== 'end') this.headerMarkup.push(token.raw);

    switch (token.type) {
      case 'start':
        this.startTag(token.name, token.attributes, token.raw);
        if (token.selfClosing) this.endTag(token.name, '');
        break;
      case 'end':
        this.endTag(token.name, token.raw);
        break;
      case 'text':
        this.text(token.text);
        break;
      case 'charref':
        this.charRef(token.ref);
        break;
      case 'entityref':
        this.entityRef(token.name);
        break;
      case 'comment':
        this.comment(token.text);
        break;
      case 'pi':
        this.processingInstruction(token.data);
        break;
      case 'decl':
        this.report.error('declaration', this.here(), `SGML declaration: <!${token.data}>`);
        break;
    }
  }

  private here(): SourceLocation {
    return { ...this.location, position: this.position };
  }

  private anchor(): string {
    return this.anchors.anchorAt(this.position);
  }

  private addToken(token: string): void {
    if (!token) return;
    this.anchor();
    this.buffer.push(token);
    this.position += token.length;
    this.anchor();
  }

  private startTag(name: string, attributes: Array<[string, string]>, raw: string): void {
    if (name === this.config.header || this.insideHeader) {
      if (!this.insideHeader) this.headerMarkup = [raw];
      this.insideHeader = true;
      return;
    }

    // An element skipped as a whole also silences its attributes.
    const skippedElement = this.config.skip.has(elementKey(name));
    const withElement: Array<[string, string]> = [...attributes, ['', '']];
    for (const [attribute, value] of withElement) {
      const key = elementKey(name, attribute);
      if (this.config.annotations.has(key) || this.skipped.has(key)) continue;
      this.skipped.add(key);
      if (attribute && !skippedElement) {
        this.report.warn('skipped-element', this.here(), `Skipping XML element <${name} ${attribute}=${value}>`);
      } else if (!attribute && attributes.length === 0) {
        this.report.warn('skipped-element', this.here(), `Skipping XML element <${name}>`);
      }
    }

    this.open.push({ name, anchor: this.anchor(), attributes: withElement, ...this.location });
  }

  private endTag(name: string, raw: string): void {
    if (this.insideHeader) {
      this.insideHeader = name !== this.config.header;
      if (this.headerMarkup) {
        this.headerMarkup.push(raw);
        if (!this.insideHeader) {
          this.headers.push(this.headerMarkup.join(''));
          this.headerMarkup = undefined;
        }
      }
      return;
    }

    let ix = this.open.length - 1;
    while (ix >= 0 && this.open[ix].name !== name) ix--;
    if (ix < 0) {
      this.report.error('unmatched-end-tag', this.here(), `Closing element </${name}>, but it is not open`);
      return;
    }

    const [element] = this.open.splice(ix, 1);
    const end = this.anchor();
    const overlaps = this.open.slice(ix).filter((other) => !canOverlap(this.config, name, other.name));
    if (overlaps.length > 0) {
      const others = overlaps.map((o) => `<${o.name}> [${o.anchor}:]`).join(', ');
      this.report.warn('overlap', this.here(), `Tag <${name}> [${element.anchor}:${end}], overlapping with ${others}`);
    }

    const edge = encodeEdge(name, [[element.anchor, end]]);
    for (const [attribute, value] of element.attributes) {
      const store = this.config.annotations.get(elementKey(name, attribute));
      if (store !== undefined) this.storeNamed(store).set(edge, value);
    }
  }

  private storeNamed(name: string): Map<string, string> {
    let store = this.stores.get(name);
    if (!store) {
      store = new Map();
      this.stores.set(name, store);
    }
    return store;
  }

  private text(content: string): void {
    for (const special of ['&', '<', '>']) {
      if (content.includes(special)) {
        this.report.error('special-character', this.here(), `XML special character: ${special}`);
      }
    }
    const text = this.position === 0 ? content.replace(/^\uFEFF+/, '') : content;
    if (this.insideHeader) return;
    for (const token of text.match(TEXT_TOKEN) ?? []) this.addToken(token);
  }

  private charRef(ref: string): void {
    const char = resolveCharRef(ref);
    if (char === undefined) {
      this.report.error('bad-reference', this.here(), `Control character reference: &${ref};`);
      return;
    }
    if (!this.insideHeader) this.addToken(char);
  }

  private entityRef(name: string): void {
    const char = resolveEntity(name);
    if (char === undefined) {
      this.report.error('bad-reference', this.here(), `Unknown HTML entity: &${name};`);
      return;
    }
    if (!this.insideHeader) this.addToken(char);
  }

  private comment(text: string): void {
    if (text.includes('--') || text.endsWith('-')) {
      this.report.error('comment-syntax', this.here(), "Comment contains '--' or ends with '-'");
    }
    if (this.insideHeader) {
      this.report.warn('comment-in-header', this.here(), '[SKIPPING] Comment in header');
      return;
    }
    this.report.warn('comment', this.here(), `Comment: ${text.length} characters wide`);
    this.startTag(COMMENT_ELEMENT, [[COMMENT_ATTRIBUTE, text]], '');
    this.endTag(COMMENT_ELEMENT, '');
  }

  private processingInstruction(data: string): void {
    if (data.startsWith('xml ') && data.endsWith('?')) {
      if (this.location.line !== 1 || this.location.column !== 0) {
        this.report.error('processing-instruction', this.here(), 'XML declaration not first in file');
      }
    } else {
      this.report.error('processing-instruction', this.here(), `Unknown processing instruction: <?${data}>`);
    }
  }

  private closeHeader(): void {
    this.report.warn('auto-close', this.here(), `(at EOF) Autoclosing header </${this.config.header}>`);
    this.insideHeader = false;
    if (this.headerMarkup) this.headers.push(this.headerMarkup.join(''));
    this.headerMarkup = undefined;
  }

  private collectHeaderMetadata(store: string): void {
    const target = this.storeNamed(store);
    for (const xml of this.headers) {
      const result = extractHeaderMetadata(xml);
      if (!result.ok) {
        this.report.warn('header-metadata', this.here(), `Header is not well-formed (line ${result.line}): ${result.message}`);
        continue;
      }
      for (const [key, value] of result.entries) target.set(key, value);
    }
  }

  /**
   * Close every element still open, most recent first, and return the
   * document. Calling it again returns the same content.
   */
  finish(): ParsedDocument {
    if (!this.finished) {
      // Forced end tags must not be taken for header content.
      if (this.insideHeader) this.closeHeader();
      while (this.open.length > 0) {
        const last = this.open[this.open.length - 1];
        this.report.warn('auto-close', this.here(), `(at EOF) Autoclosing tag </${last.name}>, starting at ${last.anchor}`);
        this.endTag(last.name, '');
      }
      this.anchor();
      if (this.config.headerStore !== undefined) this.collectHeaderMetadata(this.config.headerStore);
      this.finished = true;
    }

    return {
      text: this.buffer.join(''),
      positionToAnchor: this.anchors.positionToAnchor,
      anchorToPosition: this.anchors.anchorToPosition,
      stores: this.stores,
      report: this.report.summary(),
    };
  }
}
