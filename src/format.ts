/**
 * Text renderings of a resolved resource name.
 */
import type { ResolvedName } from './types/resolution.js';

export const OUTPUT_FORMATS = ['fqdn', 'xmlid', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format: OutputFormat) => format === value);
}

export function formatResolvedName(name: ResolvedName, format: OutputFormat): string {
  switch (format) {
    case 'fqdn':
      return `${name.package}.R.${name.type}.${name.key}`;
    case 'xmlid':
      return `@${name.package}:${name.type}/${name.key}`;
    case 'json':
      return JSON.stringify({ package: name.package, type: name.type, key: name.key });
  }
}
