/**
 * @netlens/assistant - GuidanceCatalog
 *
 * Read-only registry of the dashboard's diagnostic tools. Entry order is
 * significant: the tool resolver breaks score ties by it.
 */

import type { ToolGuidance } from './types.js';

export const TOOL_GUIDANCE: Readonly<Record<string, ToolGuidance>> = Object.freeze({
  whois: {
    title: 'WHOIS Lookup',
    description: 'Retrieves registration metadata, registrar, and key dates for a domain.',
    keywords: ['whois', 'registration', 'domain', 'owner'],
    usage: [
      'Provide a fully qualified domain name such as example.com.',
      'Check the creation/expiration dates to ensure domain ownership is current.',
      'Look at the registrar and name servers for signs of recent transfers.',
    ],
    example: '/api/whois (POST with JSON payload: {"host":"example.com"})',
  },
  dns_records: {
    title: 'DNS Records',
    description: 'Enumerates standard DNS record types (A, AAAA, MX, CNAME, TXT).',
    keywords: ['dns', 'records', 'mx', 'cname', 'txt'],
    usage: [
      'Run it when you need to confirm IP resolution or MX mail server settings.',
      'Compare results across record types to catch inconsistencies.',
    ],
    example: '/api/dns (POST with JSON payload: {"host":"example.com"})',
  },
  ip_geolocation: {
    title: 'IP Geolocation',
    description: 'Translates a host into an IP address and fetches its geographic data.',
    keywords: ['geoip', 'geolocation', 'location', 'ip'],
    usage: [
      'Combine with DNS or WHOIS to understand where the infrastructure lives.',
      'Use the returned country and ISP data to highlight unexpected hosting locations.',
    ],
    example: '/api/geoip (POST with JSON payload: {"host":"example.com"})',
  },
  port_scan: {
    title: 'Port Scan',
    description: 'Checks whether a TCP port is open on the host.',
    keywords: ['port', 'scan', 'tcp', 'open'],
    usage: [
      'Default port is 80; specify another port via the `port` field.',
      'Use this tool before running intrusive scans; it keeps the timeout short.',
    ],
    example: '/api/port_scan (POST with JSON payload: {"host":"example.com", "port":443})',
  },
  speed: {
    title: 'Speed Test',
    description: "Measures download, upload, and ping speeds from the server's location.",
    keywords: ['speed', 'bandwidth', 'ping', 'download', 'upload'],
    usage: [
      "Run this to gauge the server's outbound bandwidth before launching downloads.",
      'Expect a longer response time; inform users that it may take a minute.',
    ],
    example: '/api/speed (POST without payload)',
  },
  domain: {
    title: 'Domain Research',
    description: 'Runs configurable diagnostics for WHOIS, DNS, GeoIP, and port scans in one request.',
    keywords: ['domain research', 'fields', 'combined', 'batch', 'package'],
    usage: [
      'Send a `fields` array to control which tools run (default is all).',
      'Validate the port range (1-65535) before requesting a custom port scan.',
    ],
    example:
      '/api/domain (POST with JSON payload: {"domain":"example.com","fields":["whois","dns_records"]})',
  },
});

export type GuidanceLookup =
  | { found: true; tool: string; guidance: ToolGuidance }
  | { found: false; title: string; description: string; supportedTools: string[] };

export class GuidanceCatalog {
  private readonly entries: ReadonlyMap<string, ToolGuidance>;

  constructor(entries: Readonly<Record<string, ToolGuidance>> = TOOL_GUIDANCE) {
    this.entries = new Map(Object.entries(entries));
  }

  has(tool: string): boolean {
    return this.entries.has(tool);
  }

  get(tool: string): ToolGuidance | undefined {
    return this.entries.get(tool);
  }

  /** Tool names in catalog order. */
  tools(): string[] {
    return [...this.entries.keys()];
  }

  /** Tool names sorted alphabetically, for user-facing lists. */
  supportedTools(): string[] {
    return this.tools().sort();
  }

  /** [name, guidance] pairs in catalog order. */
  list(): Array<[string, ToolGuidance]> {
    return [...this.entries.entries()];
  }

  /**
   * Guidance for a user-supplied tool name, or a not-found record naming
   * the supported tools.
   */
  describe(tool: string | undefined): GuidanceLookup {
    const normalized = (tool ?? '').trim().toLowerCase();
    const guidance = this.entries.get(normalized);
    if (guidance) {
      return { found: true, tool: normalized, guidance };
    }
    return {
      found: false,
      title: 'Tool guidance not found',
      description: 'Provide one of the supported tool names.',
      supportedTools: this.supportedTools(),
    };
  }
}
