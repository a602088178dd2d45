/**
 * Output filename templating
 */

import type { ImageFormat } from '../config/index.js';

export const DEFAULT_NAME_TEMPLATE = '{domain}_{timestamp}';

export interface FilenameFields {
  domain: string;
  timestamp: string;
  index?: number;
}

/**
 * Authority part of the URL exactly as written (case, port and any
 * user info kept), without "www." and with dots turned into underscores.
 * Input without a scheme has an empty domain.
 */
export function domainForUrl(url: string): string {
  const match = /^[a-z][a-z0-9+.-]*:\/\/([^/?#]*)/i.exec(url);
  const netloc = match ? match[1] : '';
  return netloc.replaceAll('www.', '').replaceAll('.', '_');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function renderFilename(
  template: string,
  fields: FilenameFields,
  format: ImageFormat
): string {
  const filename = template
    .replaceAll('{domain}', fields.domain)
    .replaceAll('{timestamp}', fields.timestamp)
    .replaceAll('{index}', fields.index === undefined ? '' : String(fields.index));

  const extension = `.${format}`;
  return filename.endsWith(extension) ? filename : `${filename}${extension}`;
}

/**
 * Filename for a URL from a template, stamped with the given time
 */
export function filenameForUrl(
  url: string,
  format: ImageFormat,
  options: { template?: string; index?: number; now?: Date } = {}
): string {
  return renderFilename(
    options.template ?? DEFAULT_NAME_TEMPLATE,
    {
      domain: domainForUrl(url),
      timestamp: formatTimestamp(options.now),
      index: options.index,
    },
    format
  );
}
