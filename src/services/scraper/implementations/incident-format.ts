import { Incident } from '../interfaces/types';

export const INCIDENT_SEPARATOR = '-------';

/**
 * Render an incident as a plain-text block for the error log. Every block ends
 * with the separator line.
 */
export function formatIncident(incident: Incident): string {
  const lines: string[] = [];

  switch (incident.kind) {
    case 'renderer-failed':
      lines.push(`ERROR: Browser render failed for URL: ${incident.url}`);
      lines.push(`       Reason: ${incident.reason}`);
      break;
    case 'unreachable':
      lines.push(`ERROR: Could not fetch URL (HTTP request failed, no browser renderer): ${incident.url}`);
      break;
    case 'parse-failed':
      lines.push(`ERROR: HTML parsing failed for URL: ${incident.url}`);
      lines.push(`       Reason: ${incident.reason}`);
      break;
    case 'no-data':
      lines.push(`WARNING: No staff data extracted from URL: ${incident.url}`);
      lines.push(`         (Tried ${incident.strategies.join(', ')} formats)`);
      break;
    case 'unexpected':
      lines.push(`FATAL ERROR: Unexpected issue processing URL: ${incident.url}`);
      lines.push(`       Reason: ${incident.reason}`);
      break;
  }

  lines.push(INCIDENT_SEPARATOR);
  return lines.join('\n') + '\n';
}
