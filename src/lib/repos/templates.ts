import type { ContentStyle, ContentTemplateRecord } from '../models';
import type { TemplateStore } from '../stores';
import { queryRows } from '../db';

export async function findActiveTemplate(style: ContentStyle): Promise<ContentTemplateRecord | null> {
  const rows = await queryRows<ContentTemplateRecord>(
    `
      SELECT *
      FROM content_templates
      WHERE content_style = $1::content_style AND is_active = true
      ORDER BY updated_at DESC
      LIMIT 1
    `,
    [style],
  );
  return rows[0] || null;
}

export async function listTemplates(filters: {
  contentStyle?: ContentStyle;
  activeOnly?: boolean;
}): Promise<ContentTemplateRecord[]> {
  const where: string[] = [];
  const params: unknown[] = [];
  if (filters.contentStyle) {
    params.push(filters.contentStyle);
    where.push(`content_style = $${params.length}::content_style`);
  }
  if (filters.activeOnly) {
    where.push('is_active = true');
  }
  return queryRows<ContentTemplateRecord>(
    `
      SELECT *
      FROM content_templates
      ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
      ORDER BY content_style, name
    `,
    params,
  );
}

export function createPgTemplateStore(): TemplateStore {
  return {
    findActiveTemplate,
    listTemplates,
  };
}
