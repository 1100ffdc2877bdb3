// Inlined into every saved document; saved pages must not load stylesheets or fonts.
export const ARTICLE_CSS = `
* { margin: 0; padding: 0; box-sizing: border-box; }
body {
  font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, Cantarell, sans-serif;
  line-height: 1.6;
  color: #333;
  background-color: #fff;
  max-width: 800px;
  margin: 0 auto;
  padding: 20px;
}
.article-header { margin-bottom: 40px; padding-bottom: 20px; border-bottom: 1px solid #e0e0e0; }
.article-title { font-size: 2.5em; font-weight: 700; margin-bottom: 15px; color: #000; line-height: 1.2; }
.article-description { font-size: 1.2em; color: #666; font-style: italic; margin-bottom: 20px; line-height: 1.5; }
.article-meta { color: #666; font-size: 0.95em; }
.article-meta .article-author { font-weight: 500; color: #333; }
.article-meta .separator { margin: 0 6px; color: #bbb; }
.article-meta a { color: #666; }
.article-image { display: block; width: 100%; height: auto; margin-top: 30px; border-radius: 4px; }
.truncation-notice {
  margin: 0 0 30px;
  padding: 12px 16px;
  border-left: 4px solid #e0a800;
  background-color: #fff8e1;
  color: #5d4500;
  font-size: 0.95em;
}
.article-body { font-size: 1.1em; line-height: 1.8; }
.article-body p { margin-bottom: 20px; }
.article-body h2, .article-body h3, .article-body h4, .article-body h5, .article-body h6 {
  margin-top: 40px;
  margin-bottom: 20px;
  font-weight: 700;
  line-height: 1.3;
}
.article-body h2 { font-size: 1.75em; }
.article-body h3 { font-size: 1.5em; }
.article-body h4 { font-size: 1.25em; }
.article-body h5, .article-body h6 { font-size: 1.1em; }
.article-body figure { margin: 30px 0; }
.article-body img { max-width: 100%; height: auto; border-radius: 4px; }
.article-body figcaption { margin-top: 8px; font-size: 0.85em; color: #777; text-align: center; }
.article-body a { color: #007bff; text-decoration: none; }
.article-body a:hover { text-decoration: underline; }
.article-body blockquote { border-left: 4px solid #ddd; padding-left: 20px; margin: 30px 0; color: #666; font-style: italic; }
.article-body code {
  background-color: #f4f4f4;
  padding: 2px 6px;
  border-radius: 3px;
  font-family: 'SFMono-Regular', Menlo, Consolas, 'Courier New', monospace;
  font-size: 0.9em;
}
.article-body pre { background-color: #f4f4f4; padding: 20px; border-radius: 4px; overflow-x: auto; margin: 30px 0; }
.article-body pre code { background-color: transparent; padding: 0; white-space: pre; }
.article-body ul, .article-body ol { margin: 20px 0; padding-left: 40px; }
.article-body li { margin-bottom: 10px; }
.article-footer { margin-top: 40px; padding-top: 20px; border-top: 1px solid #e0e0e0; color: #999; font-size: 0.85em; }
.article-footer a { color: #999; }
@media (max-width: 768px) {
  body { padding: 15px; }
  .article-title { font-size: 2em; }
  .article-body { font-size: 1em; }
}
`;
