import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { loadSyncConfig } from '@/lib/config/env-validation';
import { parseDestinationName } from '@/lib/config/destinations';
import { createDestinationRouter } from '@/lib/services/destination-router';
import { ConfigurationError, TransportError, UsageError } from '@/lib/errors';

const syncRequestSchema = z.object({
  destination: z.string().min(1).optional(),
});

// Runs are sequential; a second trigger while one is in flight is turned away.
let syncInFlight = false;

async function readBody(request: NextRequest): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new UsageError('Request body must be JSON');
  }
}

export async function POST(request: NextRequest) {
  if (syncInFlight) {
    return NextResponse.json(
      { error: 'A sync is already running' },
      { status: 409 }
    );
  }

  syncInFlight = true;
  try {
    const parsed = syncRequestSchema.safeParse(await readBody(request));
    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Invalid request body', details: parsed.error.format() },
        { status: 400 }
      );
    }

    const { destination } = parsed.data;
    if (destination !== undefined) {
      parseDestinationName(destination);
    }

    const router = createDestinationRouter(loadSyncConfig());
    const results = await router.run(destination);

    return NextResponse.json({
      success: true,
      results,
      totalRows: results.reduce((sum, result) => sum + result.rows, 0),
    });
  } catch (error) {
    if (error instanceof UsageError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }
    if (error instanceof ConfigurationError) {
      return NextResponse.json(
        {
          error: 'API Configuration Error',
          message: error.message,
          required: error.variables,
        },
        { status: 400 }
      );
    }
    if (error instanceof TransportError) {
      return NextResponse.json(
        { error: error.message, upstreamStatus: error.status },
        { status: 502 }
      );
    }

    console.error('Error in sync API:', error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : 'Internal server error' },
      { status: 500 }
    );
  } finally {
    syncInFlight = false;
  }
}
