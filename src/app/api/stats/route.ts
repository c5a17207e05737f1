import { NextResponse } from 'next/server';
import { runApi } from '@/lib/api';
import { ensureSchema } from '@/lib/schema';
import { getEpisodeService } from '@/lib/services';

export async function GET() {
  return runApi(async () => {
    await ensureSchema();
    const stats = await getEpisodeService().getStats();
    return NextResponse.json(stats);
  });
}
