/**
 * Data handed from page handlers to templates
 */
export interface TemplateData {
  stringMap: Record<string, string>;
  intMap: Record<string, number>;
  floatMap: Record<string, number>;
  data: Record<string, unknown>;
  csrfToken: string;
  flash: string;
  warning: string;
  error: string;
}

/**
 * Fill every field so strict templates can reference any of them
 */
export function createTemplateData(data: Partial<TemplateData> = {}): TemplateData {
  return {
    stringMap: {},
    intMap: {},
    floatMap: {},
    data: {},
    csrfToken: '',
    flash: '',
    warning: '',
    error: '',
    ...data,
  };
}
