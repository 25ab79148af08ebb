import { describe, it, expect } from 'vitest';
import { ExecutionContext } from '../src/context/ExecutionContext.js';
import { TemplateResolver } from '../src/context/TemplateResolver.js';
import { TemplateResolutionError } from '../src/errors/index.js';
import { ManualClock } from '../src/utils/SystemClock.js';

function createScope(): ExecutionContext {
  const scope = new ExecutionContext({
    inputs: { username: 'demo', raw: '{{input.username}}' },
    environment: { TOKEN: 'test-secret' },
    context: new Map([
      ['tenant', 't-1'],
      ['blank', ''],
    ]),
  });
  scope.globals.set('id', '42');
  scope.endpointOutputs.set('login', {
    token: 'abc',
    dto: '{"items":[{"id":7},{"id":8}],"ok":true}',
  });
  scope.workflowOutputs.set('child', { ref: 'r-1' });
  scope.workflowResults.set('child', { status: 'Ok', message: 'done' });
  return scope;
}

describe('TemplateResolver', () => {
  const clock = new ManualClock(Date.UTC(2024, 0, 2, 3, 4, 5, 6));
  const resolver = new TemplateResolver({ clock, processEnv: { HOME_REGION: 'eu' } });

  describe('scopes', () => {
    it('resolves inputs with either separator', () => {
      const scope = createScope();
      expect(resolver.resolve('Hello {{input.username}}', scope)).toBe('Hello demo');
      expect(resolver.resolve('{{input:username}}', scope)).toBe('demo');
    });

    it('resolves globals and context values', () => {
      expect(resolver.resolve('{{ global.id }}-{{context.tenant}}', createScope())).toBe('42-t-1');
    });

    it('falls back to the process environment for env tokens', () => {
      const scope = createScope();
      expect(resolver.resolve('{{env.TOKEN}}', scope)).toBe('test-secret');
      expect(resolver.resolve('{{env:HOME_REGION}}', scope)).toBe('eu');
    });

    it('resolves absent context keys to an empty string', () => {
      expect(resolver.resolve('[{{context.missing}}]', createScope())).toBe('[]');
    });

    it('never rescans substituted text', () => {
      expect(resolver.resolve('{{input.raw}}', createScope())).toBe('{{input.username}}');
    });

    it('leaves text without tokens untouched', () => {
      expect(resolver.resolve('plain text', createScope())).toBe('plain text');
    });
  });

  describe('stage outputs', () => {
    it('reads endpoint outputs', () => {
      expect(resolver.resolve('{{stage:login.output.token}}', createScope())).toBe('abc');
    });

    it('falls back to workflow outputs for output tokens', () => {
      expect(resolver.resolve('{{stage.child.output.ref}}', createScope())).toBe('r-1');
    });

    it('reads nested workflow results and outputs', () => {
      const scope = createScope();
      expect(resolver.resolve('{{stage.child.workflow.result.status}}', scope)).toBe('Ok');
      expect(resolver.resolve('{{stage.child.workflow.result.message}}', scope)).toBe('done');
      expect(resolver.resolve('{{stage.child.workflow.output.ref}}', scope)).toBe('r-1');
    });

    it('ignores case in scope, stage and key names', () => {
      const scope = createScope();
      expect(resolver.resolve('{{Input.UserName}}/{{GLOBAL.ID}}/{{context.Tenant}}', scope)).toBe('demo/42/t-1');
      expect(resolver.resolve('{{stage:Login.Output.TOKEN}}', scope)).toBe('abc');
      expect(resolver.resolve('{{stage.CHILD.Workflow.Result.Status}}', scope)).toBe('Ok');
    });
  });

  describe('json projection', () => {
    it('walks a projected output with bracket indices', () => {
      expect(resolver.resolve('{{stage:json(login.output.dto).items[0].id}}', createScope())).toBe('7');
    });

    it('accepts the json(stage:...) form with dotted indices', () => {
      expect(resolver.resolve('{{json(stage:login.output.dto).items.1.id}}', createScope())).toBe('8');
    });

    it('serializes structures and booleans', () => {
      const scope = createScope();
      expect(resolver.resolve('{{json(stage:login.output.dto).items[0]}}', scope)).toBe('{"id":7}');
      expect(resolver.resolve('{{json(stage:login.output.dto).ok}}', scope)).toBe('true');
    });

    it('rejects outputs that are not JSON', () => {
      expect(() => resolver.resolve('{{json(stage:login.output.token).id}}', createScope())).toThrow(
        "Invalid json projection 'json(stage:login.output.token).id': login.output.token is not valid JSON",
      );
    });
  });

  describe('fallbacks', () => {
    it('uses the first alternative with a value', () => {
      const scope = createScope();
      expect(resolver.resolve("{{ input.region || 'eu-west' }}", scope)).toBe('eu-west');
      expect(resolver.resolve("{{ input.username || 'anonymous' }}", scope)).toBe('demo');
    });

    it('skips empty values when another alternative follows', () => {
      expect(resolver.resolve("{{context.blank || 'x'}}", createScope())).toBe('x');
    });

    it('resolves to an empty string when every alternative is missing', () => {
      expect(resolver.resolve('[{{input.a || input.b}}]', createScope())).toBe('[]');
    });
  });

  describe('response tokens', () => {
    const response = {
      status: 201,
      body: '{"id":"u-1"}',
      headers: { 'Content-Type': 'application/json' },
      json: { id: 'u-1' },
    };

    it('reads status, body fields and headers', () => {
      const scope = createScope();
      expect(resolver.resolve('{{response.status}}', scope, response)).toBe('201');
      expect(resolver.resolve('{{response.body.id}}', scope, response)).toBe('u-1');
      expect(resolver.resolve('{{response.id}}', scope, response)).toBe('u-1');
      expect(resolver.resolve('{{response.headers.content-type}}', scope, response)).toBe('application/json');
      expect(resolver.resolve('{{response.body}}', scope, response)).toBe('{"id":"u-1"}');
    });

    it('refuses response tokens without a response', () => {
      expect(() => resolver.resolve('{{response.status}}', createScope())).toThrow(
        "Token 'response.status': response tokens are not available here.",
      );
    });
  });

  describe('system values', () => {
    it('formats the clock time', () => {
      const scope = createScope();
      expect(resolver.resolve('{{system.date.utcnow}}', scope)).toBe('2024-01-02');
      expect(resolver.resolve('{{system.time.utcnow}}', scope)).toBe('03:04:05');
      expect(resolver.resolve('{{system.datetime.utcnow}}', scope)).toBe('2024-01-02T03:04:05.006Z');
      expect(resolver.resolve('{{system.timestamp}}', scope)).toBe(String(Date.UTC(2024, 0, 2, 3, 4, 5, 6)));
    });

    it('generates identifiers', () => {
      const scope = createScope();
      expect(resolver.resolve('{{system.uuid}}', scope)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(resolver.resolve('{{system.ulid}}', scope)).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    });
  });

  describe('errors', () => {
    it('reports missing keys with their scope', () => {
      const error = captureError(() => resolver.resolve('{{input.nope}}', createScope()));
      expect(error).toBeInstanceOf(TemplateResolutionError);
      expect(error?.message).toBe("Input 'nope' was not found.");
    });

    it('reports unknown scopes', () => {
      expect(() => resolver.resolve('{{foo.bar}}', createScope())).toThrow(
        "Unknown template scope 'foo' in token 'foo.bar'.",
      );
    });
  });

  describe('token helpers', () => {
    it('extracts trimmed tokens', () => {
      expect(TemplateResolver.extractTokens('a {{x.y}} b {{ z:w }}')).toEqual(['x.y', 'z:w']);
    });

    it('splits tokens on both separators and indices', () => {
      expect(TemplateResolver.splitToken('stage:login.output.items[2]')).toEqual(['stage', 'login', 'output', 'items', '2']);
    });

    it('detects tokens', () => {
      expect(TemplateResolver.hasTokens('{{input.a}}')).toBe(true);
      expect(TemplateResolver.hasTokens('none')).toBe(false);
    });
  });
});

function captureError(fn: () => unknown): Error | undefined {
  try {
    fn();
    return undefined;
  } catch (error) {
    return error instanceof Error ? error : undefined;
  }
}
