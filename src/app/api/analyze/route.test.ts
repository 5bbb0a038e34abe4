import { describe, expect, it } from 'vitest';
import { NextRequest } from 'next/server';
import { POST } from './route';

function makeRequest(body: string): NextRequest {
  return new NextRequest('http://localhost/api/analyze', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('POST /api/analyze', () => {
  it('rejects a body that is not JSON', async () => {
    const res = await POST(makeRequest('{not json'));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid request body' });
  });

  it('returns validation messages', async () => {
    const res = await POST(makeRequest(JSON.stringify({ html: 42 })));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Expected string, received number' });
  });

  it('analyzes a document', async () => {
    const res = await POST(
      makeRequest(JSON.stringify({ html: '<h1>Green tea</h1><p>Green tea is brewed cool.</p>', primaryKeyword: 'green tea' })),
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.outcome).toBe('ok');
    expect(body.report.keywords.primary.count).toBe(2);
  });
});
