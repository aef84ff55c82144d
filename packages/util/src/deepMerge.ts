export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: PlainObject, source: PlainObject | undefined): PlainObject {
  const output: PlainObject = { ...target };
  if (!source) return output;
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      output[key] = [...value];
    } else if (isPlainObject(value)) {
      const current = output[key];
      output[key] = deepMerge(isPlainObject(current) ? current : {}, value);
    } else {
      output[key] = value;
    }
  }
  return output;
}
