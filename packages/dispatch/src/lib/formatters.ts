/**
 * Output formatters. Each derives a new artifact from content; the content
 * object is left as it was.
 */

import type { Content, FinalArtifact, Formatter, Tag } from '@relaykit/core';
import { escapeHtml } from './html.js';

function artifact(content: Content, format: Tag, rendered: string): FinalArtifact {
  return { kind: content.kind, format, rendered, metadata: structuredClone(content.metadata) };
}

/** Wraps the body between an opening and a closing marker line */
export class EnvelopeFormatter implements Formatter {
  constructor(
    readonly format: Tag,
    private readonly open: string,
    private readonly close: string,
  ) {}

  apply(content: Content): FinalArtifact {
    return artifact(content, this.format, `${this.open}\n${content.body}\n${this.close}`);
  }
}

export class HtmlFormatter implements Formatter {
  readonly format = 'html';

  apply(content: Content): FinalArtifact {
    return artifact(content, this.format, `<html><body><pre>${escapeHtml(content.body)}</pre></body></html>`);
  }
}

/** Hands the body through unchanged (pre-built notification messages) */
export class PassthroughFormatter implements Formatter {
  constructor(readonly format: Tag = 'passthrough') {}

  apply(content: Content): FinalArtifact {
    return artifact(content, this.format, content.body);
  }
}

export function createPdfFormatter(): Formatter {
  return new EnvelopeFormatter('pdf', '[PDF FORMAT]', '[END PDF]');
}

export function createExcelFormatter(): Formatter {
  return new EnvelopeFormatter('excel', '[EXCEL FORMAT]', '[END EXCEL]');
}
