/**
 * Unit tests for the Python renderer
 */

import { describe, it, expect } from 'vitest';
import {
  PythonRenderer,
  pythonFieldName,
  pythonLiteral,
  pythonType,
} from '../../../src/lib/renderer/python-renderer.js';
import { parseJson, toJsonValue } from '../../../src/lib/inferencer/json-value.js';
import { synthesizeModel } from '../../../src/lib/synthesizer/model-synthesizer.js';
import type { ClientMethod, JsonValue } from '../../../src/types/data-model.js';

const renderer = new PythonRenderer();

function value(text: string): JsonValue {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    throw new Error(parsed.error);
  }
  return parsed.value;
}

function method(overrides: Partial<ClientMethod>): ClientMethod {
  return {
    name: 'get_users',
    httpMethod: 'GET',
    url: 'https://api.test.com/users?page=1',
    baseUrl: 'https://api.test.com/users',
    path: '/users',
    headers: [],
    query: [],
    body: { kind: 'none' },
    callCount: 1,
    ...overrides,
  };
}

describe('pythonType', () => {
  it('should map type tags to typing annotations', () => {
    expect(pythonType({ kind: 'optional-any' })).toBe('Optional[Any]');
    expect(pythonType({ kind: 'float' })).toBe('float');
    expect(pythonType({ kind: 'dict-string-any' })).toBe('Dict[str, Any]');
    expect(pythonType({ kind: 'list-of', item: { kind: 'int' } })).toBe('List[int]');
  });
});

describe('pythonLiteral', () => {
  it('should render scalars with Python spelling', () => {
    expect(pythonLiteral(value('null'))).toBe('None');
    expect(pythonLiteral(value('true'))).toBe('True');
    expect(pythonLiteral(value('false'))).toBe('False');
    expect(pythonLiteral(value('1.0'))).toBe('1.0');
    expect(pythonLiteral(value('2.5'))).toBe('2.5');
    expect(pythonLiteral(value('7'))).toBe('7');
    expect(pythonLiteral(value('"hi"'))).toBe('"hi"');
  });

  it('should write numbers from their captured lexeme', () => {
    expect(pythonLiteral(value('1e21'))).toBe('1e21');
    expect(pythonLiteral(value('-2.5E-3'))).toBe('-2.5E-3');
    expect(pythonLiteral(value('12345678901234567890'))).toBe('12345678901234567890');
    expect(pythonLiteral(toJsonValue(1e21))).toBe('1000000000000000000000');
  });

  it('should pretty-print nested containers', () => {
    expect(pythonLiteral(value('{"a": [1, null], "b": {}}'))).toBe(
      ['{', '    "a": [', '        1,', '        None,', '    ],', '    "b": {},', '}'].join('\n'),
    );
  });
});

describe('PythonRenderer.renderModel', () => {
  it('should render a record as a dataclass', () => {
    expect(
      renderer.renderModel({
        kind: 'record',
        name: 'UserModel',
        fields: [
          { name: 'id', originalName: 'id', type: { kind: 'int' } },
          { name: 'class_', originalName: 'class', type: { kind: 'optional-any' } },
        ],
      }),
    ).toBe(
      [
        '@dataclass',
        'class UserModel:',
        '    """Model generated from captured response data."""',
        '    id: int',
        '    class_: Optional[Any]',
      ].join('\n'),
    );
  });

  it('should give an empty record a pass body', () => {
    expect(renderer.renderModel({ kind: 'record', name: 'EmptyModel', fields: [] })).toBe(
      '@dataclass\nclass EmptyModel:\n    """Model generated from captured response data."""\n    pass',
    );
  });

  it('should alias lists', () => {
    const output = renderer.renderModel({
      kind: 'list-of-record',
      name: 'UsersModel',
      item: { kind: 'record', name: 'UsersModelItem', fields: [] },
    });
    expect(output.endsWith('    pass\n\n\nUsersModel = List[UsersModelItem]')).toBe(true);
    expect(
      renderer.renderModel({ kind: 'list-of-primitive', name: 'IdsModel', itemType: { kind: 'int' } }),
    ).toBe('IdsModel = List[int]');
  });

  it('should render a placeholder as a comment only', () => {
    expect(
      renderer.renderModel({ kind: 'placeholder', name: 'OkModel', sampled: { kind: 'bool' } }),
    ).toBe('# OkModel: simple type bool, no fields to derive');
  });
});

describe('pythonFieldName', () => {
  it('should keep only identifier characters', () => {
    expect(pythonFieldName('@type')).toBe('_type');
    expect(pythonFieldName('$ref')).toBe('_ref');
    expect(pythonFieldName('user_id')).toBe('user_id');
  });
});

describe('PythonRenderer field names', () => {
  it('should render every captured key as a distinct valid field', () => {
    const model = synthesizeModel(
      value('{"a-b": 1, "a_b": 2, "@type": "doc", "_type": true}'),
      'DocModel',
      { reservedWords: renderer.reservedWords },
    );

    expect(renderer.renderModel(model).split('\n').slice(3)).toEqual([
      '    a_b: int',
      '    a_b2: int',
      '    _type: str',
      '    _type2: bool',
    ]);
  });
});

describe('PythonRenderer.renderModelsFile', () => {
  it('should start with the typing imports and label blocks by URL', () => {
    const output = renderer.renderModelsFile(
      new Map([
        [
          'https://api.test.com/ok',
          {
            url: 'https://api.test.com/ok',
            index: 0,
            definition: { kind: 'placeholder', name: 'OkModel', sampled: { kind: 'bool' } },
          },
        ],
      ]),
    );
    const lines = output.split('\n');

    expect(lines).toContain('from dataclasses import dataclass');
    expect(lines).toContain('from typing import Any, Dict, List, Optional');
    expect(output.endsWith(
      '# Model for: https://api.test.com/ok\n# OkModel: simple type bool, no fields to derive\n',
    )).toBe(true);
  });
});

describe('PythonRenderer.renderClient', () => {
  it('should render a requests session method with overridable maps', () => {
    const output = renderer.renderClient({
      name: 'TestClient',
      modelImports: [],
      methods: [
        method({
          headers: [['Accept', 'application/json']],
          query: [['page', '1']],
        }),
      ],
    });
    const lines = output.split('\n');

    expect(lines).toContain('import requests');
    expect(lines).toContain('class TestClient:');
    expect(lines).toContain('    def get_users(self, **kwargs):');
    expect(lines).toContain(
      '        url = self.base_url + "/users" if self.base_url else "https://api.test.com/users"',
    );
    expect(lines).toContain('            "Accept": "application/json",');
    expect(lines).toContain('        headers.update(kwargs.get("headers", {}))');
    expect(lines).toContain('            "page": "1",');
    expect(lines).toContain('        params.update(kwargs.get("params", {}))');
    expect(lines).toContain('        return response');
    expect(lines).toContain('        headers = CaseInsensitiveDict({');
  });

  it('should merge dict bodies and import declared models', () => {
    const output = renderer.renderClient({
      name: 'TestClient',
      modelImports: ['UsersModel'],
      methods: [
        method({
          name: 'post_users',
          httpMethod: 'POST',
          returnType: 'UsersModel',
          body: { kind: 'json', value: value('{"active": true}') },
        }),
      ],
    });
    const lines = output.split('\n');

    expect(lines).toContain('from .models import UsersModel');
    expect(lines).toContain('    def post_users(self, **kwargs) -> UsersModel:');
    expect(lines).toContain('            "active": True,');
    expect(lines).toContain('        json_data.update(kwargs.get("json", {}))');
    expect(lines).toContain('            json=json_data,');
    expect(lines).toContain('        return response.json()');
  });

  it('should send text bodies as data', () => {
    const lines = renderer
      .renderClient({
        name: 'TestClient',
        modelImports: [],
        methods: [method({ httpMethod: 'POST', body: { kind: 'text', text: 'a=1' } })],
      })
      .split('\n');

    expect(lines).toContain('        json_data = kwargs.get("json")');
    expect(lines).toContain('        data = kwargs.get("data", "a=1" if json_data is None else None)');
    expect(lines).toContain('            data=data,');
  });

  it('should accept body overrides on methods captured without a body', () => {
    const lines = renderer
      .renderClient({
        name: 'TestClient',
        modelImports: [],
        methods: [
          method({
            name: 'delete_items',
            httpMethod: 'DELETE',
            url: 'https://api.test.com/items',
            baseUrl: 'https://api.test.com/items',
            path: '/items',
          }),
        ],
      })
      .split('\n');

    expect(lines).toContain('        json_data = kwargs.get("json")');
    expect(lines).toContain('        data = kwargs.get("data")');
    expect(lines).toContain('            json=json_data,');
    expect(lines).toContain('            data=data,');
  });

  it('should render big integers in bodies without rounding', () => {
    const lines = renderer
      .renderClient({
        name: 'TestClient',
        modelImports: [],
        methods: [
          method({
            httpMethod: 'POST',
            body: { kind: 'json', value: value('{"id": 12345678901234567890}') },
          }),
        ],
      })
      .split('\n');

    expect(lines).toContain('            "id": 12345678901234567890,');
  });

  it('should note when the captured URL is relative', () => {
    const output = renderer.renderClient({
      name: 'TestClient',
      modelImports: [],
      methods: [method({ url: '/api/orders', baseUrl: '/api/orders', path: '/api/orders' })],
    });

    expect(output.split('\n')).toContain(
      '        The captured URL is relative; construct the client with a base_url.',
    );
  });
});
