/**
 * 重複判定用のリンク正規化（前後の空白とフラグメントを除去）
 */
export function normalizeLink(link: string): string {
  const trimmed = link.trim();
  const hashIndex = trimmed.indexOf('#');
  return hashIndex >= 0 ? trimmed.slice(0, hashIndex) : trimmed;
}
