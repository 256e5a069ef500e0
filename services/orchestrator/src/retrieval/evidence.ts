/**
 * Evidence construction helpers
 */

import type { CorpusDocument, EvidenceItem, EvidenceOrigin } from '@medrag/shared-types';

/**
 * Display text: the entry name in 【】 on its own line, then the content
 */
export function formatDocumentContent(document: CorpusDocument): string {
  return document.name ? `【${document.name}】\n${document.content}` : document.content;
}

export function documentToEvidence(
  document: CorpusDocument,
  origin: EvidenceOrigin,
  score: number | null
): EvidenceItem {
  return Object.freeze({
    origin,
    content: formatDocumentContent(document),
    score,
    metadata: Object.freeze({
      retrievalType: origin,
      documentId: document.id,
      name: document.name ?? null,
      ...document.fields,
    }),
  });
}

/**
 * Truncated copy of the content for previews
 */
export function previewContent(content: string, maxLength: number): string {
  return content.length > maxLength ? `${content.slice(0, maxLength)}...` : content;
}
