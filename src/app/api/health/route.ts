import { NextResponse } from 'next/server';
import { queryRows } from '@/lib/db';
import { createLogger, errorMessage } from '@/lib/log';
import { ensureSchema } from '@/lib/schema';
import { getHealthProbes } from '@/lib/services';

const PROBE_TIMEOUT_MS = 5_000;
const logger = createLogger({ base: { component: 'health' } });

async function checkDatabase(): Promise<{ ok: boolean; detail?: string }> {
  try {
    await ensureSchema();
    await queryRows('SELECT 1');
    return { ok: true };
  } catch (error) {
    logger.error('health.database_failed', { message: errorMessage(error) });
    return { ok: false, detail: errorMessage(error) };
  }
}

export async function GET() {
  const [database, collaborators] = await Promise.all([
    checkDatabase(),
    Promise.all(getHealthProbes().map((probe) => probe.checkHealth(AbortSignal.timeout(PROBE_TIMEOUT_MS)))),
  ]);
  const degraded = collaborators.some((probe) => !probe.ok);
  return NextResponse.json(
    {
      ok: database.ok,
      status: !database.ok ? 'unavailable' : degraded ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      services: { postgres: database, collaborators },
    },
    { status: database.ok ? 200 : 503 },
  );
}
