import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { createAnalysisEngine, SiteRequestSchema } from '@/lib/analyzers/analyze';

export const runtime = 'nodejs';

const engine = createAnalysisEngine();

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Invalid request body' }, { status: 400 });
  }

  let parsed: z.infer<typeof SiteRequestSchema>;
  try {
    parsed = SiteRequestSchema.parse(body);
  } catch (err) {
    if (err instanceof z.ZodError) {
      const message = err.issues.map(issue => issue.message).join(', ') || 'Invalid keyword map';
      return NextResponse.json({ error: message }, { status: 400 });
    }
    return NextResponse.json({ error: 'Invalid keyword map' }, { status: 400 });
  }

  try {
    const report = await engine.analyzeSite(parsed);
    return NextResponse.json(report);
  } catch (err) {
    console.error('POST /api/site-keywords error:', err);
    return NextResponse.json({ error: 'Failed to analyze keyword map' }, { status: 500 });
  }
}
