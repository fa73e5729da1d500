import type { CategorySummary, Note } from '../types/index.js';
import { escapeHtml } from '../utils/html.js';

/**
 * Server-rendered HTML for the read-only web UI.
 * Note bodies arrive pre-rendered; everything else is escaped here.
 */

export type RenderedNotes = Map<string, string>;

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} · Scratchpad</title>
<script src="https://unpkg.com/htmx.org@1.9.12"></script>
</head>
<body>
<header><a href="/">Scratchpad</a> · <a href="/search">Search</a></header>
<main>
${body}
</main>
</body>
</html>
`;
}

export function noteCard(note: Note, html: string): string {
  return `<article class="note" id="note-${note.id}">
<header><a href="/category/${encodeURIComponent(note.category)}">${escapeHtml(note.category)}</a> <time datetime="${note.createdAt.toISOString()}">${formatDate(note.createdAt)}</time></header>
<div class="note-body">${html}</div>
</article>`;
}

export function noteCardList(notes: Note[], rendered: RenderedNotes): string {
  if (notes.length === 0) {
    return '<p class="empty">No notes yet.</p>';
  }
  return notes.map((note) => noteCard(note, rendered.get(note.id) ?? escapeHtml(note.content))).join('\n');
}

function categoryList(categories: CategorySummary[]): string {
  if (categories.length === 0) {
    return '<p class="empty">No categories yet.</p>';
  }
  const items = categories.map(
    (c) =>
      `<li><a href="/category/${encodeURIComponent(c.name)}">${escapeHtml(c.name)}</a> <span class="count">${c.count}</span> <time datetime="${c.lastNote.toISOString()}">${formatDate(c.lastNote)}</time></li>`
  );
  return `<ul class="categories">\n${items.join('\n')}\n</ul>`;
}

export function homePage(categories: CategorySummary[], totalNotes: number): string {
  return layout(
    'Home',
    `<h1>Categories</h1>
<p class="total">${totalNotes} notes</p>
${categoryList(categories)}`
  );
}

export function categoryPage(category: string, notes: Note[], totalCount: number, rendered: RenderedNotes): string {
  return layout(
    category,
    `<h1>${escapeHtml(category)}</h1>
<p class="total">${totalCount} notes</p>
<section id="notes">
${noteCardList(notes, rendered)}
</section>`
  );
}

export function searchPage(categories: CategorySummary[]): string {
  const options = categories
    .map((c) => `<option value="${escapeHtml(c.name)}">${escapeHtml(c.name)}</option>`)
    .join('');
  return layout(
    'Search',
    `<h1>Search</h1>
<form hx-get="/fragments/search" hx-target="#results">
<input type="search" name="q" placeholder="Search notes">
<select name="category"><option value="">All categories</option>${options}</select>
<input type="date" name="since">
<input type="date" name="until">
<button type="submit">Search</button>
</form>
<section id="results"></section>`
  );
}

export function searchResults(notes: Note[], rendered: RenderedNotes, query: string | undefined): string {
  const heading = query
    ? `<p class="summary">${notes.length} results for “${escapeHtml(query)}”</p>`
    : `<p class="summary">${notes.length} results</p>`;
  return `${heading}\n${noteCardList(notes, rendered)}`;
}
