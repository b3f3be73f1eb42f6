/** Detect MIME type from a file name or path based on its extension. */
export function detectMimeType(fileNameOrPath: string): string {
  const ext = fileNameOrPath.split('.').pop()?.toLowerCase();
  switch (ext) {
    case 'arff':
      return 'text/x-arff';
    case 'gz':
      return 'application/gzip';
    default:
      return 'text/plain';
  }
}
