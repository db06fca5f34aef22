/**
 * Browser-like request headers.
 *
 * The endpoints are fronted by the same site that serves the Pollinations
 * web UI, so requests carry the headers a desktop Chrome tab would send.
 */

export interface HeaderFields {
  accept: string;
  acceptLanguage?: string;
  contentType?: string;
  origin?: string;
  priority?: string;
  referer?: string;
  secChUa?: string;
  secChUaMobile?: string;
  secChUaPlatform?: string;
  secFetchSite?: string;
  secGpc?: string;
  userAgent?: string;
}

const DEFAULT_FIELDS = {
  acceptLanguage: "en-US,en;q=0.5",
  referer: "https://karma.pollinations.ai/",
  secChUa: '"Brave";v="131", "Chromium";v="131", "Not_A Brand";v="24"',
  secChUaMobile: "?0",
  secChUaPlatform: '"Windows"',
  secFetchSite: "same-site",
  secGpc: "1",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
} satisfies Partial<HeaderFields>;

/** Wire name for each field, in the order headers are rendered. */
const WIRE_NAMES: ReadonlyArray<[keyof HeaderFields, string]> = [
  ["accept", "accept"],
  ["acceptLanguage", "accept-language"],
  ["contentType", "content-type"],
  ["origin", "origin"],
  ["priority", "priority"],
  ["referer", "referer"],
  ["secChUa", "sec-ch-ua"],
  ["secChUaMobile", "sec-ch-ua-mobile"],
  ["secChUaPlatform", "sec-ch-ua-platform"],
  ["secFetchSite", "sec-fetch-site"],
  ["secGpc", "sec-gpc"],
  ["userAgent", "user-agent"],
];

export class HeaderProfile {
  readonly fields: Readonly<HeaderFields>;

  constructor(fields: HeaderFields) {
    const merged: HeaderFields = { ...DEFAULT_FIELDS, accept: fields.accept };
    // an explicit undefined leaves the default in place
    for (const [field] of WIRE_NAMES) {
      const value = fields[field];
      if (value !== undefined) {
        merged[field] = value;
      }
    }
    this.fields = Object.freeze(merged);
  }

  /** Header mapping ready for the transport. Unset fields are left out. */
  render(): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [field, wireName] of WIRE_NAMES) {
      const value = this.fields[field];
      if (value !== undefined) {
        headers[wireName] = value;
      }
    }
    return headers;
  }
}
