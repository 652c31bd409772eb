/**
 * arXiv identifier helpers
 */

/**
 * Canonical arXiv ID without URL prefix or version suffix
 * http://arxiv.org/abs/2401.01234v2 -> 2401.01234
 * hep-th/9901001v1 -> hep-th/9901001
 */
export function normalizeArxivId(raw: string): string {
  const trimmed = raw.trim();
  const absIndex = trimmed.indexOf("/abs/");
  const id = absIndex >= 0 ? trimmed.slice(absIndex + "/abs/".length) : trimmed;
  return id.replace(/v\d+$/, "");
}

export function arxivAbsUrl(id: string): string {
  return `https://arxiv.org/abs/${id}`;
}

export function arxivPdfUrl(id: string): string {
  return `https://arxiv.org/pdf/${id}`;
}
