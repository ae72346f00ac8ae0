import { describe, it, expect } from 'vitest';
import { decodeRequest, encodeRequest, encodeResponse, toWireResponse } from '../../src/types/codec.js';
import { errorResponse, successResponse, type DispatchResponse } from '../../src/types/models.js';

describe('decodeRequest', () => {
  it('decodes a full request document', () => {
    const req = decodeRequest(
      '{"id":"req-1","source":"sqs","type":"greet","payload":{"name":"Ada"},"metadata":{"k":"v"},"timestamp":"2024-03-01T12:00:00Z"}'
    );

    expect(req).toEqual({
      id: 'req-1',
      source: 'sqs',
      type: 'greet',
      payload: '{"name":"Ada"}',
      metadata: { k: 'v' },
      timestamp: new Date('2024-03-01T12:00:00Z'),
    });
  });

  it('fills optional fields with empty values', () => {
    expect(decodeRequest('{"type":"greet","payload":[1,2]}')).toEqual({
      id: '',
      source: '',
      type: 'greet',
      payload: '[1,2]',
      metadata: {},
    });
  });

  it('keeps a null payload as JSON null', () => {
    expect(decodeRequest('{"type":"greet","payload":null}')?.payload).toBe('null');
  });

  it.each([
    ['not JSON', 'hello'],
    ['missing type', '{"payload":{}}'],
    ['missing payload', '{"type":"greet"}'],
    ['non-string metadata', '{"type":"greet","payload":{},"metadata":{"n":1}}'],
    ['bad timestamp', '{"type":"greet","payload":{},"timestamp":"yesterday"}'],
    ['array', '[1,2,3]'],
  ])('returns null for %s', (_label, text) => {
    expect(decodeRequest(text)).toBeNull();
  });
});

describe('encodeRequest', () => {
  it('embeds the payload as JSON', () => {
    const text = encodeRequest({
      id: 'req-1',
      source: 'http',
      type: 'greet',
      payload: '{"name":"Ada"}',
      timestamp: new Date('2024-03-01T12:00:00.000Z'),
    });

    expect(JSON.parse(text)).toEqual({
      id: 'req-1',
      source: 'http',
      type: 'greet',
      payload: { name: 'Ada' },
      metadata: {},
      timestamp: '2024-03-01T12:00:00.000Z',
    });
  });
});

describe('toWireResponse', () => {
  const processedAt = new Date('2024-03-01T12:00:00.000Z');

  it('parses data and renames the time fields', () => {
    const resp: DispatchResponse = {
      ...successResponse('req-1', { greeting: 'hi' }),
      metadata: { trace_id: 't-1' },
      processedAt,
      durationMs: 12,
    };

    expect(toWireResponse(resp)).toEqual({
      id: 'req-1',
      success: true,
      data: { greeting: 'hi' },
      metadata: { trace_id: 't-1' },
      processed_at: '2024-03-01T12:00:00.000Z',
      duration: 12,
    });
  });

  it('carries the error and omits absent fields', () => {
    const resp = { ...errorResponse('req-2', 'NOT_FOUND', 'missing', 'no row 7'), processedAt };

    expect(JSON.parse(encodeResponse(resp))).toEqual({
      id: 'req-2',
      success: false,
      error: { code: 'NOT_FOUND', message: 'missing', details: 'no row 7', retryable: false },
      metadata: {},
      processed_at: '2024-03-01T12:00:00.000Z',
    });
  });

  it('keeps data that is not JSON as a string', () => {
    const resp = { ...successResponse('req-3'), data: 'plain', processedAt };

    expect(toWireResponse(resp).data).toBe('plain');
  });
});
