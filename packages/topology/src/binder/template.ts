import { UnresolvedTemplateError } from '../errors.js';

/**
 * Fields a connection template may reference. Which of them are defined depends
 * on the edge: `kind` only on dependency edges, `service` only when the consumer
 * is a service, `provider` only when the target is a provider, `clusterDomain`
 * only on Kubernetes backends.
 */
export const TEMPLATE_FIELDS = [
  'name',
  'id',
  'host',
  'port',
  'consumer',
  'service',
  'kind',
  'provider',
  'backend',
  'mode',
  'environment',
  'region',
  'namespace',
  'clusterDomain',
] as const;

export type TemplateField = (typeof TEMPLATE_FIELDS)[number];
export type TemplateFields = Partial<Record<TemplateField, string>>;

const PLACEHOLDER = /\{\{\s*([^{}]*?)\s*\}\}/g;

function isTemplateField(value: string): value is TemplateField {
  return TEMPLATE_FIELDS.some(field => field === value);
}

/**
 * Substitute `{{field}}` placeholders. A placeholder naming an unknown field, or a
 * field the edge does not define, fails the whole binding.
 */
export function renderTemplate(template: string, fields: TemplateFields, edgeId: string): string {
  const rendered = template.replace(PLACEHOLDER, (_match, rawField: string) => {
    const value = isTemplateField(rawField) ? fields[rawField] : undefined;
    if (value === undefined || value === '') {
      throw new UnresolvedTemplateError(rawField, template, edgeId);
    }
    return value;
  });

  if (rendered.includes('{{') || rendered.includes('}}')) {
    throw new UnresolvedTemplateError(rendered, template, edgeId);
  }
  if (rendered.trim() === '') {
    throw new UnresolvedTemplateError('', template, edgeId);
  }
  return rendered;
}
