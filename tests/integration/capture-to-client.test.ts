/**
 * Integration test: HAR capture -> models -> client source
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { HarReader } from '../../src/lib/reader/index.js';
import { CaptureGenerator } from '../../src/lib/generator/index.js';
import { ConfigError } from '../../src/utils/errors.js';
import { json, makeCall } from '../helpers.js';

const fixture = fileURLToPath(new URL('../fixtures/users.har', import.meta.url));

describe('Capture to client', () => {
  it('should infer one model per JSON response URL', async () => {
    const reader = await new HarReader(fixture).load();
    const generator = new CaptureGenerator(reader);

    const models = generator.generateModels();

    expect(Array.from(models.keys())).toEqual([
      'https://api.test.com/v1/users?page=1',
      'https://api.test.com/v1/users',
      'https://api.test.com/v1/health',
    ]);
    expect(models.get('https://api.test.com/v1/users?page=1')).toBe(
      [
        '/**',
        ' * Model generated from captured response data.',
        ' */',
        'export interface UsersModelItem {',
        '  id: number;',
        '  name: string;',
        '  email?: unknown;',
        '}',
        '',
        'export type UsersModel = UsersModelItem[];',
      ].join('\n'),
    );
    expect(models.get('https://api.test.com/v1/users')).toContain('export interface UsersModel2 {');
    expect(models.get('https://api.test.com/v1/health')).toContain('  ok: boolean;');
  });

  it('should keep the last sampled response per URL', async () => {
    const reader = await new HarReader(fixture).load();
    const generator = new CaptureGenerator(reader);

    generator.generateModels();

    expect(generator.getModelTable().get('https://api.test.com/v1/users?page=1')?.index).toBe(1);
  });

  it('should generate a typed client with one method per endpoint', async () => {
    const reader = await new HarReader(fixture).load();
    const generator = new CaptureGenerator(reader, {
      clientName: 'ShopClient',
      useModelAnnotations: true,
    });

    const result = generator.generate();
    const lines = result.client.split('\n');

    expect(result.groups.map((group) => group.name)).toEqual([
      'get_users',
      'post_users',
      'get_health',
      'post_login',
    ]);
    expect(result.clientDefinition.modelImports).toEqual(['UsersModel', 'UsersModel2', 'HealthModel']);
    expect(lines).toContain(
      'import type { UsersModel, UsersModel2, HealthModel } from "./models.js";',
    );
    expect(lines).toContain('export class ShopClient {');
    expect(lines).toContain(
      '  async get_users(overrides: RequestOverrides = {}): Promise<UsersModel> {',
    );
    expect(lines).toContain(
      '  async post_login(overrides: RequestOverrides = {}): Promise<Response> {',
    );
    expect(lines).toContain('   * Headers merged from 2 captured calls.');
    expect(lines).toContain('        "Accept": "application/json",');
    expect(lines).toContain('        "X-Trace": "abc",');
    expect(lines).toContain('      "name": "Carol",');
    expect(lines).toContain('      "active": true,');
    expect(lines).toContain(
      '      overrides.json !== undefined ? JSON.stringify(overrides.json) : overrides.data ?? "user=alice&pass=test-password";',
    );
    expect(result.client).not.toContain('"Host"');
    expect(result.client).not.toContain('":authority"');
    expect(result.client).not.toContain('"Content-Length"');
    expect(result.modelsFile.startsWith('/**\n * Models inferred from captured HTTP responses.\n */\n\n// Model for: https://api.test.com/v1/users?page=1\n')).toBe(true);
  });

  it('should leave methods untyped without annotations', async () => {
    const reader = await new HarReader(fixture).load();
    const client = new CaptureGenerator(reader).generateClient();

    expect(client).not.toContain('import type');
    expect(client).not.toContain('Promise<UsersModel>');
  });

  it('should generate annotations on demand without a prior model run', () => {
    const generator = new CaptureGenerator();
    const calls = [
      makeCall({ url: 'https://api.test.com/orders', responseBody: json({ id: 1 }) }),
    ];

    const definition = generator.buildClientDefinition(calls, { useModelAnnotations: true });

    expect(definition.methods[0].returnType).toBe('OrdersModel');
    expect(generator.getModelTable().size).toBe(1);
  });

  it('should rebuild annotations for a different batch of calls', () => {
    const generator = new CaptureGenerator();
    generator.generateModels([makeCall({ url: 'https://api.test.com/a', responseBody: json({ x: 1 }) })]);

    const definition = generator.buildClientDefinition(
      [makeCall({ url: 'https://api.test.com/orders', responseBody: json({ id: 1 }) })],
      { useModelAnnotations: true },
    );

    expect(definition.methods[0].returnType).toBe('OrdersModel');
    expect(Array.from(generator.getModelTable().keys())).toEqual(['https://api.test.com/orders']);
  });

  it('should reuse the model table built from the same calls', () => {
    const generator = new CaptureGenerator();
    const calls = [makeCall({ url: 'https://api.test.com/orders', responseBody: json({ id: 1 }) })];
    generator.generateModels(calls);
    const table = generator.getModelTable();

    generator.buildClientDefinition(calls, { useModelAnnotations: true });

    expect(generator.getModelTable()).toBe(table);
  });

  it('should render Python output when targeted', async () => {
    const reader = await new HarReader(fixture).load();
    const result = new CaptureGenerator(reader, {
      target: 'python',
      useModelAnnotations: true,
      excludeHeaders: ['x-trace'],
    }).generate();

    const lines = result.client.split('\n');
    expect(lines).toContain('from .models import UsersModel, UsersModel2, HealthModel');
    expect(lines).toContain('    def get_users(self, **kwargs) -> UsersModel:');
    expect(result.client).not.toContain('X-Trace');
    expect(result.modelsFile).toContain('UsersModel = List[UsersModelItem]');
  });

  it('should fail without calls or a capture source', () => {
    expect(() => new CaptureGenerator().generateModels()).toThrow(ConfigError);
    expect(() => new CaptureGenerator().generateClient()).toThrow(
      'No captured calls or capture source provided',
    );
  });

  it('should reject invalid options at construction', () => {
    expect(() => new CaptureGenerator(undefined, { clientName: 'not valid' })).toThrow(ConfigError);
  });
});
