/**
 * Template Resolution Engine
 *
 * Replaces `{{scope.key}}` / `{{scope:key}}` tokens against the scopes of
 * one workflow invocation.
 *
 * Supported scopes:
 * - input: declared workflow inputs
 * - global: initStage variables
 * - context: mutable context map (absent keys resolve to "")
 * - env: merged environment map, then process.env
 * - stage / stages: captured stage outputs and nested workflow results
 *   `stage.<name>.output.<key>`, `stage.<name>.workflow.result.status`
 * - response: the current endpoint response (output, set, context, message)
 * - system: values computed at resolution time
 *
 * Advanced features:
 * - JSON projection: `stage:json(S.output.dto).items[0].id`
 *   (also `json(stage:S.output.dto).items.0.id`)
 * - Fallbacks: `{{ input.region || 'eu-west' }}`
 *
 * Tokens are resolved left to right; substituted text is never rescanned.
 *
 * @module context
 */

import { randomUUID } from 'node:crypto';
import { TemplateResolutionError } from '../errors/index.js';
import { lookupIgnoreCase } from '../utils/caseInsensitive.js';
import { formatDate } from '../utils/dateFormat.js';
import { ulid } from '../utils/ulid.js';
import { systemClock, type SystemClock } from '../utils/SystemClock.js';
import type { TemplateScope } from './ExecutionContext.js';

/**
 * Response view exposed to `response.*` tokens
 */
export interface TemplateResponse {
  status: number;
  body: string;
  headers: Readonly<Record<string, string>>;
  /** Parsed body, undefined when the body is not JSON */
  json?: unknown;
}

export interface TemplateResolverOptions {
  clock?: SystemClock;
  /** Fallback for env tokens; defaults to process.env */
  processEnv?: Readonly<Record<string, string | undefined>>;
}

const PROJECTION_PATTERNS = [
  /^(?:stage|stages)\s*[.:]\s*json\(\s*([^)]*?)\s*\)(.*)$/i,
  /^json\(\s*(?:stage|stages)\s*[.:]\s*([^)]*?)\s*\)(.*)$/i,
];

const SCOPE_LABELS: Record<string, string> = {
  input: 'Input',
  global: 'Global variable',
  context: 'Context value',
  env: 'Environment variable',
  stage: 'Stage output',
  stages: 'Stage output',
  endpoint: 'Endpoint output',
  workflow: 'Workflow output',
  response: 'Response value',
  system: 'System value',
};

export class TemplateResolver {
  private readonly clock: SystemClock;
  private readonly processEnv: Readonly<Record<string, string | undefined>>;

  constructor(options: TemplateResolverOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.processEnv = options.processEnv ?? process.env;
  }

  /**
   * Match `{{ ... }}`; group 1 is the trimmed token
   */
  static tokenPattern(): RegExp {
    return /\{\{\s*(.+?)\s*\}\}/g;
  }

  static hasTokens(template: string): boolean {
    return TemplateResolver.tokenPattern().test(template);
  }

  static extractTokens(template: string): string[] {
    return Array.from(template.matchAll(TemplateResolver.tokenPattern()), (match) => match[1] ?? '');
  }

  /**
   * `stage:login.output.token` → ['stage', 'login', 'output', 'token'];
   * `[n]` indices become segments
   */
  static splitToken(token: string): string[] {
    return token
      .replace(/\[(\d+)\]/g, '.$1')
      .replace(/:/g, '.')
      .split('.')
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0);
  }

  /**
   * Resolve every token in a template
   *
   * @throws {TemplateResolutionError} On unknown scopes, missing keys or bad projections
   */
  resolve(template: string, scope: TemplateScope, response?: TemplateResponse): string {
    if (!template.includes('{{')) {
      return template;
    }
    return template.replace(TemplateResolver.tokenPattern(), (_match, token: string) =>
      this.resolveToken(token, scope, response),
    );
  }

  resolveOptional(template: string | undefined, scope: TemplateScope, response?: TemplateResponse): string | undefined {
    return template === undefined ? undefined : this.resolve(template, scope, response);
  }

  /**
   * Resolve every value of a template map, keeping its keys
   */
  resolveMap(
    map: Readonly<Record<string, string>> | undefined,
    scope: TemplateScope,
    response?: TemplateResponse,
  ): Record<string, string> {
    const resolved: Record<string, string> = {};
    if (!map) {
      return resolved;
    }
    for (const [key, template] of Object.entries(map)) {
      resolved[key] = this.resolve(template, scope, response);
    }
    return resolved;
  }

  /**
   * Resolve one token (the text between the braces), applying `||` fallbacks
   */
  resolveToken(token: string, scope: TemplateScope, response?: TemplateResponse): string {
    const alternatives = splitAlternatives(token);

    for (const alternative of alternatives) {
      const literal = parseLiteral(alternative);
      const value = literal ?? this.tryResolveToken(alternative, scope, response);
      if (value !== undefined && (value !== '' || alternatives.length === 1)) {
        return value;
      }
    }

    const primary = alternatives[0] ?? token;
    const [root = '', ...rest] = TemplateResolver.splitToken(primary);
    if (alternatives.length > 1) {
      return '';
    }
    if (root.toLowerCase() === 'context') {
      return '';
    }
    throw TemplateResolutionError.missingKey(token, SCOPE_LABELS[root.toLowerCase()] ?? root, rest.join('.'));
  }

  /**
   * Resolve one token without fallbacks
   *
   * @returns The value, or undefined when the key has no value (including
   *          absent context keys)
   * @throws {TemplateResolutionError} For unknown scopes and malformed tokens
   */
  tryResolveToken(token: string, scope: TemplateScope, response?: TemplateResponse): string | undefined {
    const trimmed = token.trim();

    for (const pattern of PROJECTION_PATTERNS) {
      const match = pattern.exec(trimmed);
      if (match) {
        return this.resolveProjection(trimmed, match[1] ?? '', match[2] ?? '', scope);
      }
    }
    if (/^json\(/i.test(trimmed)) {
      throw TemplateResolutionError.invalidProjection(trimmed, 'expected json(stage:<stage>.output.<key>)');
    }

    const [rawRoot, ...path] = TemplateResolver.splitToken(trimmed);
    const root = (rawRoot ?? '').toLowerCase();
    const key = path.join('.');

    switch (root) {
      case 'input':
        return lookup(scope.inputs, key);
      case 'global':
        return scope.globals.get(key);
      case 'context':
        return scope.context.get(key);
      case 'env':
        return lookup(scope.environment, key) ?? this.processEnv[key];
      case 'stage':
      case 'stages':
        return this.resolveStage(path, scope);
      case 'endpoint':
        return path[1] === 'output' ? lookup(scope.endpointOutputs.get(path[0] ?? ''), path.slice(2).join('.')) : undefined;
      case 'workflow':
        return this.resolveStage([path[0] ?? '', 'workflow', ...path.slice(1)], scope);
      case 'response':
        return this.resolveResponse(trimmed, path, response);
      case 'system':
        return this.resolveSystem(path);
      default:
        throw TemplateResolutionError.unknownScope(trimmed, rawRoot ?? '');
    }
  }

  private resolveStage(path: string[], scope: TemplateScope): string | undefined {
    const [stageName = '', rawSection = '', ...rest] = path;
    const section = rawSection.toLowerCase();

    if (section === 'workflow') {
      const [rawKind = '', ...keyParts] = rest;
      const kind = rawKind.toLowerCase();
      if (kind === 'result') {
        const result = scope.workflowResults.get(stageName);
        const field = keyParts.join('.').toLowerCase();
        if (!result) return undefined;
        if (field === 'status') return result.status;
        if (field === 'message') return result.message;
        return undefined;
      }
      if (kind === 'output') {
        return lookup(scope.workflowOutputs.get(stageName), keyParts.join('.'));
      }
      return undefined;
    }

    if (section === 'output') {
      const key = rest.join('.');
      return lookup(scope.endpointOutputs.get(stageName), key) ?? lookup(scope.workflowOutputs.get(stageName), key);
    }

    return undefined;
  }

  private resolveProjection(token: string, inner: string, remainder: string, scope: TemplateScope): string | undefined {
    const parts = TemplateResolver.splitToken(inner);
    const [stageName, section, ...keyParts] = parts;
    if (!stageName || section !== 'output' || keyParts.length === 0) {
      throw TemplateResolutionError.invalidProjection(token, 'expected <stage>.output.<key> inside json(...)');
    }

    const key = keyParts.join('.');
    const raw = lookup(scope.endpointOutputs.get(stageName), key) ?? lookup(scope.workflowOutputs.get(stageName), key);
    if (raw === undefined) {
      return undefined;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch {
      throw TemplateResolutionError.invalidProjection(token, `${stageName}.output.${key} is not valid JSON`);
    }

    const walked = walkJson(document, TemplateResolver.splitToken(remainder.replace(/^\s*\./, '')));
    return walked === undefined ? undefined : formatScalar(walked);
  }

  private resolveResponse(token: string, path: string[], response?: TemplateResponse): string | undefined {
    if (!response) {
      throw TemplateResolutionError.responseUnavailable(token);
    }

    const [first, ...rest] = path;
    if (first === 'status' && rest.length === 0) {
      return String(response.status);
    }
    if (first === 'body' && rest.length === 0) {
      return response.body;
    }
    if (first === 'headers') {
      const name = rest.join('.').toLowerCase();
      const header = Object.entries(response.headers).find(([key]) => key.toLowerCase() === name);
      return header?.[1];
    }
    if (first === undefined) {
      return response.body;
    }

    if (response.json === undefined) {
      throw TemplateResolutionError.responseUnavailable(token, 'response body is not JSON.');
    }
    const jsonPath = first === 'body' ? rest : path;
    const value = walkJson(response.json, jsonPath);
    return value === undefined ? undefined : formatScalar(value);
  }

  private resolveSystem(path: string[]): string | undefined {
    const [kind = '', when = 'now'] = path.map((segment) => segment.toLowerCase());
    const now = new Date(this.clock.now());
    const utc = when === 'utcnow';
    if (when !== 'now' && when !== 'utcnow') {
      return undefined;
    }

    switch (kind) {
      case 'datetime':
        return utc ? now.toISOString() : formatDate(now, "yyyy-MM-dd'T'HH:mm:ss.fff", false);
      case 'date':
        return formatDate(now, 'yyyy-MM-dd', utc);
      case 'time':
        return formatDate(now, 'HH:mm:ss', utc);
      case 'timestamp':
        return String(now.getTime());
      case 'uuid':
      case 'guid':
        return randomUUID();
      case 'ulid':
        return ulid(now.getTime());
      default:
        return undefined;
    }
  }
}

function lookup(record: Readonly<Record<string, string>> | undefined, key: string): string | undefined {
  return lookupIgnoreCase(record, key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk a parsed JSON value by property names and array indices
 */
export function walkJson(value: unknown, path: readonly string[]): unknown {
  let current: unknown = value;
  for (const segment of path) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isRecord(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

/**
 * Strings raw, numbers and booleans as text, null as "", structures as JSON
 */
export function formatScalar(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value === null || value === undefined) return '';
  return JSON.stringify(value);
}

/**
 * Split on `||` outside quotes
 */
function splitAlternatives(token: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (let i = 0; i < token.length; i++) {
    const char = token[i] ?? '';
    if (quote) {
      if (char === quote) quote = null;
      current += char;
    } else if (char === '"' || char === "'") {
      quote = char;
      current += char;
    } else if (char === '|' && token[i + 1] === '|') {
      parts.push(current.trim());
      current = '';
      i++;
    } else {
      current += char;
    }
  }
  parts.push(current.trim());
  return parts;
}

function parseLiteral(expression: string): string | undefined {
  const quoted = /^(['"])(.*)\1$/s.exec(expression);
  if (quoted) {
    return quoted[2] ?? '';
  }
  if (/^-?\d+(?:\.\d+)?$/.test(expression)) {
    return expression;
  }
  return undefined;
}
