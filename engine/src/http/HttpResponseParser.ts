/**
 * HTTP Response Parser
 *
 * Reads a fetch Response into the shape templates resolve against.
 *
 * @module http
 */

import type { EndpointResponse } from './EndpointInvoker.js';

export class HttpResponseParser {
  static async parse(response: Response): Promise<EndpointResponse> {
    const body = await response.text();
    const parsed: EndpointResponse = {
      status: response.status,
      body,
      headers: this.extractHeaders(response),
    };

    const json = this.tryParseJson(body);
    if (json !== undefined) {
      parsed.json = json;
    }
    return parsed;
  }

  /**
   * Parsed JSON, or undefined when the text is empty or not JSON
   */
  static tryParseJson(text: string): unknown {
    if (!text.trim()) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      return undefined;
    }
  }

  static extractHeaders(response: Response): Record<string, string> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    return headers;
  }
}
