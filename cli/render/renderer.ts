import type { Article, ContentBlock, InlineSpan } from '../../shared/types';
import { escapeHtml, isHttpUrl } from '../utils/text';
import { ARTICLE_CSS } from './styles';

export interface RenderOptions {
  /** When the page was fetched; printed in the footer. */
  generatedAt: Date;
}

export const TRUNCATION_NOTICE =
  'This article may be incomplete. The page only exposed a preview, so some of the text could be missing.';

// Images may be inlined as data URLs; everything else must be a plain web link.
const CONTENT_SECURITY_POLICY = "default-src 'none'; img-src data: http: https:; style-src 'unsafe-inline'";

const ISO_DATE_PREFIX_RE = /^(\d{4})-(\d{2})-(\d{2})/;

const dateFormatter = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: 'numeric',
  year: 'numeric',
  timeZone: 'UTC',
});

/**
 * Formats a publish date as "January 5, 2024". ISO strings keep their calendar date regardless
 * of the offset they carry; anything unparseable is returned as given.
 */
export const formatPublishedDate = (value: string): string => {
  const trimmed = value.trim();
  const iso = ISO_DATE_PREFIX_RE.exec(trimmed);
  if (iso) {
    const [, year, month, day] = iso;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    if (!Number.isNaN(date.getTime()) && date.getUTCDate() === Number(day)) {
      return dateFormatter.format(date);
    }
    return trimmed;
  }
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? trimmed : dateFormatter.format(new Date(parsed));
};

const isSafeImageSrc = (src: string): boolean => isHttpUrl(src) || /^data:image\/[a-z0-9.+-]+[;,]/i.test(src);

const renderSpan = (span: InlineSpan): string => {
  let html = escapeHtml(span.text);
  if (span.italic) html = `<em>${html}</em>`;
  if (span.bold) html = `<strong>${html}</strong>`;
  if (span.href && isHttpUrl(span.href)) html = `<a href="${escapeHtml(span.href)}">${html}</a>`;
  return html;
};

export const renderBlock = (block: ContentBlock): string => {
  switch (block.type) {
    case 'heading': {
      // the document title is the only h1
      const tag = `h${Math.max(2, block.level)}`;
      return `<${tag}>${escapeHtml(block.text)}</${tag}>`;
    }
    case 'paragraph': {
      const inner = block.spans.length ? block.spans.map(renderSpan).join('') : escapeHtml(block.text);
      return `<p>${inner}</p>`;
    }
    case 'image': {
      if (!isSafeImageSrc(block.src)) return '';
      const alt = block.alt ?? '';
      const caption = alt ? `<figcaption>${escapeHtml(alt)}</figcaption>` : '';
      return `<figure><img src="${escapeHtml(block.src)}" alt="${escapeHtml(alt)}" loading="lazy">${caption}</figure>`;
    }
    case 'code': {
      const language = block.language && /^[\w+#-]+$/.test(block.language) ? block.language : undefined;
      const classAttr = language ? ` class="language-${escapeHtml(language.toLowerCase())}"` : '';
      return `<pre><code${classAttr}>${escapeHtml(block.text)}</code></pre>`;
    }
    case 'quote':
      return `<blockquote>${escapeHtml(block.text)}</blockquote>`;
    case 'list': {
      const tag = block.ordered ? 'ol' : 'ul';
      const items = block.items.map((item) => `<li>${escapeHtml(item)}</li>`).join('');
      return `<${tag}>${items}</${tag}>`;
    }
  }
};

const renderMeta = (article: Article): string => {
  const parts: string[] = [];
  if (article.author) {
    parts.push(`<span class="article-author">By ${escapeHtml(article.author)}</span>`);
  }
  if (article.publishedDate) {
    parts.push(`<span class="article-date">${escapeHtml(formatPublishedDate(article.publishedDate))}</span>`);
  }
  if (isHttpUrl(article.sourceUrl)) {
    parts.push(`<a class="article-source" href="${escapeHtml(article.sourceUrl)}">Original article</a>`);
  }
  return parts.join('<span class="separator">·</span>');
};

const renderFooter = (article: Article, generatedAt: Date): string => {
  const source = isHttpUrl(article.sourceUrl)
    ? ` from <a href="${escapeHtml(article.sourceUrl)}">${escapeHtml(article.sourceUrl)}</a>`
    : '';
  const stamp = generatedAt.toISOString();
  return `<footer class="article-footer">Saved${source} on <time datetime="${stamp}">${escapeHtml(
    stamp.replace('T', ' ').replace(/\.\d+Z$/, ' UTC'),
  )}</time></footer>`;
};

const renderLeadImage = (article: Article): string =>
  article.image && isSafeImageSrc(article.image)
    ? `\n<img class="article-image" src="${escapeHtml(article.image)}" alt="${escapeHtml(article.title)}" loading="lazy">`
    : '';

/** Builds a standalone HTML document for the article. Writing it anywhere is the caller's job. */
export const renderArticle = (article: Article, { generatedAt }: RenderOptions): string => {
  const title = escapeHtml(article.title);
  const description = article.description
    ? `\n<p class="article-description">${escapeHtml(article.description)}</p>`
    : '';
  const meta = renderMeta(article);
  const notice = article.truncated ? `\n<aside class="truncation-notice">${escapeHtml(TRUNCATION_NOTICE)}</aside>` : '';
  const body = article.blocks
    .map(renderBlock)
    .filter(Boolean)
    .join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<meta http-equiv="Content-Security-Policy" content="${CONTENT_SECURITY_POLICY}">
<title>${title}</title>
<style>${ARTICLE_CSS}</style>
</head>
<body>
<article>
<header class="article-header">
<h1 class="article-title">${title}</h1>${description}
<div class="article-meta">${meta}</div>${renderLeadImage(article)}
</header>${notice}
<div class="article-body">
${body}
</div>
${renderFooter(article, generatedAt)}
</article>
</body>
</html>
`;
};
