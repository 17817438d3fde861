// Unknown extensions fall back to JPEG
export const DEFAULT_MIME_TYPE = "image/jpeg";

export const MIME_TYPES: Readonly<Record<string, string>> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  pdf: "application/pdf",
};

/**
 * Pull the extension out of a file name, path or bare extension.
 * "scan.PDF" → "pdf", ".png" → "png", "jpeg" → "jpeg", "README" → "readme"
 */
export function fileExtension(fileNameOrExtension: string): string {
  const base = fileNameOrExtension.trim().split(/[\\/]/).pop() || "";
  const dot = base.lastIndexOf(".");
  return (dot === -1 ? base : base.slice(dot + 1)).toLowerCase();
}

export function resolveMimeType(fileNameOrExtension: string): string {
  const extension = fileExtension(fileNameOrExtension);
  return Object.hasOwn(MIME_TYPES, extension) ? MIME_TYPES[extension] : DEFAULT_MIME_TYPE;
}
