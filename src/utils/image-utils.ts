/**
 * Image Utilities
 */

/**
 * Get the file extension for image bytes from their magic number.
 * Defaults to `.png` when the format cannot be determined.
 */
export function getImageExtensionFromData(data: Uint8Array): string {
  // JPEG: FF D8 FF
  if (data.length >= 3 && data[0] === 0xFF && data[1] === 0xD8 && data[2] === 0xFF) {
    return '.jpg';
  }

  // PNG: 89 50 4E 47
  if (data.length >= 8 && data[0] === 0x89 && data[1] === 0x50 && data[2] === 0x4E && data[3] === 0x47) {
    return '.png';
  }

  // BMP: 42 4D
  if (data.length >= 2 && data[0] === 0x42 && data[1] === 0x4D) {
    return '.bmp';
  }

  return '.png';
}

/**
 * Extension for a MIME type, if it is an image type we know
 */
export function getImageExtensionFromMimeType(mimeType: string | null | undefined): string | undefined {
  switch (mimeType) {
    case 'image/png':
      return '.png';
    case 'image/jpeg':
      return '.jpg';
    case 'image/bmp':
      return '.bmp';
    default:
      return undefined;
  }
}
