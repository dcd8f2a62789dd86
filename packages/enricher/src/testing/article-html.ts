type ArticleParts = {
  title?: string;
  author?: string;
  dateText?: string;
  paragraphs?: string[];
};

/** Minimal news article page used across tests. */
export function articleHtml(parts: ArticleParts): string {
  const head = [
    parts.title === undefined ? '' : `<title>${parts.title}</title>`,
    parts.author === undefined ? '' : `<meta name="author" content="${parts.author}">`,
  ].join('');
  const body = [
    parts.dateText === undefined ? '' : `<span class="post-date">${parts.dateText}</span>`,
    ...(parts.paragraphs ?? []).map((paragraph) => `<p>${paragraph}</p>`),
  ].join('');

  return `<html><head>${head}</head><body>${body}</body></html>`;
}
