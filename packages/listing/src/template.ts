import { escapeAttr, escapeHtml } from "./escape";

export type Crumb = {
  title: string;
  href: string | null;
};

export type IconId = "folder" | "folder-shortcut" | "file" | "file-shortcut";

const STYLES = `
    * { padding: 0; margin: 0; }
    body { font-family: sans-serif; text-rendering: optimizespeed; background-color: #ffffff; }
    a { color: #006ed3; text-decoration: none; }
    a:hover, h1 a:hover { color: #319cff; }
    header { padding: 25px 5% 15px; background-color: #f2f2f2; }
    h1 { font-size: 20px; font-weight: normal; white-space: nowrap; overflow-x: hidden; text-overflow: ellipsis; color: #999; }
    h1 a { color: #000; margin: 0 4px; }
    h1 a:first-child { margin: 0; }
    h1 a:hover { text-decoration: underline; }
    h1 .current { color: #000; margin: 0 4px; }
    main { display: block; }
    table { width: 100%; border-collapse: collapse; }
    tr { border-bottom: 1px dashed #dadada; }
    tbody tr:hover { background-color: #ffffec; }
    th, td { text-align: left; padding: 10px 0; }
    th { padding-top: 15px; padding-bottom: 15px; font-size: 16px; white-space: nowrap; }
    th:first-child, td:first-child, th:last-child, td:last-child { width: 5%; }
    td { white-space: nowrap; font-size: 14px; }
    td:nth-child(2) { width: 80%; }
    td:nth-child(3) { padding: 0 20px; }
    th:nth-child(4), td:nth-child(4) { text-align: right; }
    td:nth-child(2) svg { position: absolute; }
    td .name, td .goup { margin-left: 1.75em; word-break: break-all; overflow-wrap: break-word; white-space: pre-wrap; }
    tr.clickable { cursor: pointer; }
    tr.clickable a { display: block; }
    @media (max-width: 600px) {
        * { font-size: 1.06rem; }
        .hideable { display: none; }
        td:nth-child(2) { width: auto; }
        th:nth-child(3), td:nth-child(3) { padding-right: 5%; text-align: right; }
        h1 { color: #000; }
        h1 a { margin: 0; }
    }`;

const ICONS = `
    <svg version="1.1" xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink" height="0" width="0" style="position: absolute;">
    <defs>
        <g id="go-up">
            <path d="M10,9V5L3,12L10,19V14.9C15,14.9 18.5,16.5 21,20C20,15 17,10 10,9Z" fill="#696969"/>
        </g>
        <g id="folder" fill-rule="nonzero" fill="none">
            <path d="M285 38H143L111 0H32C14 0 0 17 0 38v75h317V75c0-21-14-37-32-37z" fill="#FFA000"/>
            <path d="M285 36H32C14 36 0 50 0 68v158c0 18 14 32 32 32h253c18 0 32-14 32-32V68c0-18-14-32-32-32z" fill="#FFCA28"/>
        </g>
        <g id="folder-shortcut" fill-rule="nonzero" fill="none">
            <use xlink:href="#folder"/>
            <path d="M120 240c-20-60 10-110 110-110v-40l70 60-70 60v-40c-70 0-100 20-110 70z" fill="#FFFFFF"/>
        </g>
        <g id="file" stroke="#000" stroke-width="25" fill="#FFF" fill-rule="evenodd" stroke-linecap="round" stroke-linejoin="round">
            <path d="M13 24v275c0 6 6 11 13 11h213c7 0 13-5 13-11V136L128 13H26c-7 0-13 5-13 11z"/>
            <path d="M129 13v101c0 10 7 19 16 19h104L129 13z"/>
        </g>
        <g id="file-shortcut" fill="none">
            <use xlink:href="#file"/>
            <path d="M60 290c-20-60 10-110 110-110v-40l70 60-70 60v-40c-70 0-100 20-110 70z" fill="#000000"/>
        </g>
    </defs>
    </svg>`;

export function renderBreadcrumbs(crumbs: Crumb[]) {
  return crumbs
    .map((crumb) =>
      crumb.href
        ? `<a href="${escapeAttr(crumb.href)}">${escapeHtml(crumb.title)}</a>`
        : `<span class="current">${escapeHtml(crumb.title)}</span>`,
    )
    .join(" / ");
}

/** Everything up to and including the ".." row of the listing table. */
export function renderDocumentTop(title: string, crumbs: Crumb[], baseHref: string) {
  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <base href="${escapeAttr(baseHref)}">
    <title>${escapeHtml(title)}</title>
    <style>${STYLES}
    </style>
</head>
<body>${ICONS}
<header>
    <h1>${renderBreadcrumbs(crumbs)}</h1>
</header>
<main>
<div class="listing">
    <table aria-describedby="summary">
        <thead>
        <tr>
            <th></th>
            <th>Name</th>
            <th>Size</th>
            <th class="hideable">Modified</th>
            <th class="hideable"></th>
        </tr>
        </thead>
        <tbody>
        <tr class="clickable">
            <td></td>
            <td><a href=".."><svg width="1.5em" height="1em" version="1.1" viewBox="0 0 24 24"><use xlink:href="#go-up"></use></svg>
                <span class="goup">..</span></a></td>
            <td>&mdash;</td>
            <td class="hideable">&mdash;</td>
            <td class="hideable"></td>
        </tr>
`;
}

export function renderDocumentBottom() {
  return `        </tbody>
    </table>
</div>
</main>
</body>
</html>`;
}

export type RowInput = {
  href: string;
  name: string;
  icon: IconId;
  sizeOrder: number;
  sizeLabel: string;
  modifiedIso: string;
  modifiedLabel: string;
};

export function renderRow(row: RowInput) {
  return `        <tr class="file">
            <td></td>
            <td>
                <a href="${escapeAttr(row.href)}">
                    <svg width="1.5em" height="1em" version="1.1" viewBox="0 0 265 323"><use xlink:href="#${row.icon}"></use></svg>
                    <span class="name">${escapeHtml(row.name)}</span>
                </a>
            </td>
            <td data-order="${row.sizeOrder}">${row.sizeLabel}</td>
            <td class="hideable"><time datetime="${escapeAttr(row.modifiedIso)}">${escapeHtml(row.modifiedLabel)}</time></td>
            <td class="hideable"></td>
        </tr>
`;
}

export function renderTruncationNotice(nextEntry: number) {
  return `        <tr class="truncated"><td></td><td><b>Listing truncated...</b> <a href="?entry=${nextEntry}">Next Page</a></td><td></td><td></td><td></td></tr>
`;
}
