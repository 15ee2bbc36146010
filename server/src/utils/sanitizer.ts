const MAX_LENGTH = 128;
const MAX_EXTENSION = 16;

/**
 * Makes an uploader-supplied name safe to store and echo back in headers:
 * basename only, `[A-Za-z0-9._-]`, no leading dots, at most 128 characters
 * with the extension kept when truncating.
 */
export function sanitizeFileName(name: string | undefined | null, fallback = "file"): string {
  if (!name) return fallback;

  const base = name.split(/[\\/]/).pop() ?? "";
  let safe = base
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^\.+/, "");

  if (safe.length > MAX_LENGTH) {
    const dot = safe.lastIndexOf(".");
    const extension = dot > 0 && safe.length - dot <= MAX_EXTENSION ? safe.slice(dot) : "";
    safe = safe.slice(0, MAX_LENGTH - extension.length) + extension;
  }

  return safe || fallback;
}

/** `Content-Disposition` value with an ASCII fallback and the UTF-8 original. */
export function contentDisposition(
  fileName: string,
  disposition: "inline" | "attachment" = "attachment",
): string {
  const ascii = sanitizeFileName(fileName);
  return `${disposition}; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}
