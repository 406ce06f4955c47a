import { z } from 'zod';
import type { TenantConfig, TenantId, Vertical, VerticalField } from '../../common/types.js';

export const TENANT_CONFIG_COLLECTION = 'agency_configs';

export const DEFAULT_VERTICALS: readonly Vertical[] = [
  { id: 'knots', label: 'Knots', description: 'Weddings', type: 'wedding', fields: [] },
  { id: 'pluto', label: 'Pluto', description: 'Kids', type: 'children', fields: [] },
  {
    id: 'festia',
    label: 'Festia',
    description: 'Events',
    type: 'general',
    fields: [
      { name: 'event_scale', label: 'Scale', type: 'select', options: ['Private', 'Corporate', 'Mass'] },
      { name: 'company_name', label: 'Company Name', type: 'text', options: [] },
    ],
  },
  {
    id: 'thryv',
    label: 'Thryv',
    description: 'Marketing',
    type: 'general',
    fields: [{ name: 'service_type', label: 'Service', type: 'text', options: [] }],
  },
];

const verticalFieldSchema = z.object({
  name: z.string().min(1),
  label: z.string().optional().catch(undefined),
  type: z.string().catch('text'),
  options: z.array(z.string()).catch([]),
});

const verticalSchema = z.object({
  id: z.string().min(1),
  label: z.string().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
  type: z.string().optional().catch(undefined),
  fields: z.array(z.unknown()).catch([]),
});

const storedConfigSchema = z.object({
  verticals: z.array(z.unknown()),
});

export function defaultTenantConfig(tenantId: TenantId): TenantConfig {
  return { tenantId, verticals: structuredClone([...DEFAULT_VERTICALS]) };
}

function parseField(raw: unknown): VerticalField | undefined {
  const parsed = verticalFieldSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  const { name, label, type, options } = parsed.data;
  return { name, label: label ?? name, type, options };
}

function parseVertical(raw: unknown): Vertical | undefined {
  const parsed = verticalSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  const { id, label, description, type, fields } = parsed.data;
  const vertical: Vertical = {
    id,
    label: label ?? id,
    fields: fields.flatMap(field => parseField(field) ?? []),
  };
  if (description !== undefined) vertical.description = description;
  if (type !== undefined) vertical.type = type;
  return vertical;
}

/**
 * Reads each stored vertical on its own: an entry only needs a string `id`
 * to count as configured. Returns undefined when the document has no
 * `verticals` array at all.
 */
export function parseStoredVerticals(doc: unknown): Vertical[] | undefined {
  const parsed = storedConfigSchema.safeParse(doc);
  if (!parsed.success) {
    return undefined;
  }
  return parsed.data.verticals.flatMap(raw => parseVertical(raw) ?? []);
}
