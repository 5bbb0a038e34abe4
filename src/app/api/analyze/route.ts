import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { createAnalysisEngine, DocumentRequestSchema } from '@/lib/analyzers/analyze';

export const runtime = 'nodejs';

const engine = createAnalysisEngine();

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Invalid request body' }, { status: 400 });
  }

  let parsed: z.infer<typeof DocumentRequestSchema>;
  try {
    parsed = DocumentRequestSchema.parse(body);
  } catch (err) {
    if (err instanceof z.ZodError) {
      const message = err.issues.map(issue => issue.message).join(', ') || 'Invalid analysis request';
      return NextResponse.json({ error: message }, { status: 400 });
    }
    return NextResponse.json({ error: 'Invalid analysis request' }, { status: 400 });
  }

  try {
    const result = await engine.analyzeDocument(parsed);
    return NextResponse.json(result);
  } catch (err) {
    console.error('POST /api/analyze error:', err);
    return NextResponse.json({ error: 'Failed to analyze document' }, { status: 500 });
  }
}
