export function escapeHtml(s: string) {
  return s
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#039;");
}

/** The URL itself when it is absolute http(s), otherwise undefined. */
export function safeUrl(value: string): string | undefined {
  if (!URL.canParse(value)) return undefined;
  const { protocol } = new URL(value);
  return protocol === "http:" || protocol === "https:" ? value : undefined;
}

const STYLE = `
  body{font-family:system-ui,sans-serif;margin:0;color:#222;background:#fafafa}
  header{display:flex;gap:16px;align-items:center;padding:16px 24px;background:#fff;border-bottom:1px solid #eee}
  header a{font-weight:700;text-decoration:none;color:#222}
  form input{padding:8px 12px;width:320px;border:1px solid #ccc;border-radius:6px}
  main{max-width:840px;margin:0 auto;padding:24px}
  ul.articles{list-style:none;padding:0}
  .article{display:flex;gap:16px;padding:16px 0;border-bottom:1px solid #eee}
  .article img{width:160px;height:100px;object-fit:cover;border-radius:6px}
  .article h3{margin:0 0 6px}
  .meta{color:#777;font-size:14px}
  nav.pagination{display:flex;justify-content:space-between;margin-top:24px}
`;

/** Full document shell with the search box in the header. */
export function renderLayout(opts: { title: string; keyword?: string; body: string }) {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(opts.title)}</title>
<style>${STYLE}</style>
</head>
<body>
<header>
<a href="/">News Search</a>
<form action="/search" method="GET" role="search">
<input type="search" name="q" value="${escapeHtml(opts.keyword ?? "")}" placeholder="Enter a news topic" autofocus>
</form>
</header>
<main>
${opts.body}
</main>
</body>
</html>
`;
}
