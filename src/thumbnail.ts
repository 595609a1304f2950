const PLACEHOLDER = "__w";

function parseWidths(segment: string): string[] | null {
  if (segment === PLACEHOLDER) return [];
  if (!segment.startsWith(`${PLACEHOLDER}-`)) return null;
  return segment.slice(PLACEHOLDER.length + 1).split("-");
}

// images/__w-400-600-800/img.jpg -> images/w400/img.jpg; bad templates stay as is
export function thumbUrl(url: string): string {
  const segments = url.split("/");
  for (let i = 0; i < segments.length; i++) {
    const widths = parseWidths(segments[i]);
    if (widths === null) continue;
    if (widths.length === 0 || !widths.every((w) => /^0*[1-9]\d*$/.test(w))) {
      return url;
    }
    segments[i] = `w${widths[0].replace(/^0+/, "")}`;
    return segments.join("/");
  }
  return url;
}
