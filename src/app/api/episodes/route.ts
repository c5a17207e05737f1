import { NextRequest, NextResponse } from 'next/server';
import { readJsonBody, runApi } from '@/lib/api';
import { requireRole } from '@/lib/auth';
import { validationError } from '@/lib/errors';
import { createEpisodeInputSchema, listEpisodesQuerySchema } from '@/lib/episodeService';
import { ensureSchema } from '@/lib/schema';
import { getEpisodeService } from '@/lib/services';

export async function GET(request: NextRequest) {
  return runApi(async () => {
    await ensureSchema();
    const search = request.nextUrl.searchParams;
    const parsed = listEpisodesQuerySchema.safeParse({
      status: search.get('status') ?? undefined,
      contentStyle: search.get('contentStyle') ?? undefined,
      limit: search.get('limit') ?? undefined,
    });
    if (!parsed.success) return validationError(parsed.error);
    const episodes = await getEpisodeService().listEpisodes(parsed.data);
    return NextResponse.json({ episodes });
  });
}

export async function POST(request: NextRequest) {
  return runApi(async () => {
    const authError = requireRole(request, 'editor');
    if (authError) return authError;
    const parsed = createEpisodeInputSchema.safeParse(await readJsonBody(request));
    if (!parsed.success) return validationError(parsed.error);
    await ensureSchema();
    const episode = await getEpisodeService().createEpisode(parsed.data);
    return NextResponse.json({ episode }, { status: 201 });
  });
}
