import { OutboundRecordSchema, type OutboundRecord, type ScrapeResult, type ScrapeStatus } from '../types/scrape-result.js';

/**
 * Result for a task that never reached the browser (cancelled while
 * queued, or a defect outside the session)
 */
export function emptyResult(domain: string, status: ScrapeStatus, error: string): ScrapeResult {
  return Object.freeze({
    domain,
    status,
    ip: null,
    obfuscation: false,
    scriptPaths: Object.freeze([]),
    redirectDomain: false,
    htmlContent: '',
    error
  });
}

export function toOutboundRecord(result: ScrapeResult, processor: string): OutboundRecord {
  return {
    domain: result.domain,
    status_code: result.status,
    ip: result.ip ? [...result.ip] : null,
    obfuscation: result.obfuscation,
    script_paths: [...result.scriptPaths],
    redirect_domain: result.redirectDomain,
    html_content: result.htmlContent,
    ...(result.error !== undefined ? { error: result.error } : {}),
    processor
  };
}

export function encodeResult(result: ScrapeResult, processor: string): string {
  return JSON.stringify(toOutboundRecord(result, processor));
}

/**
 * Parse a published record, e.g. in consumers or tests
 * @throws ZodError when the payload does not match the wire format
 */
export function decodeRecord(payload: string): OutboundRecord {
  return OutboundRecordSchema.parse(JSON.parse(payload));
}
