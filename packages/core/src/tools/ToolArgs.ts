const asObject = (args: unknown): Record<string, unknown> =>
  typeof args === "object" && args !== null && !Array.isArray(args) ? Object.fromEntries(Object.entries(args)) : {};

export const stringArg = (args: unknown, key: string): string => {
  const value = asObject(args)[key];
  if (typeof value !== "string") {
    throw new Error(`Argument ${key} must be a string`);
  }
  return value;
};

export const optionalStringArg = (args: unknown, key: string): string | undefined => {
  const value = asObject(args)[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Argument ${key} must be a string`);
  }
  return value;
};

export const optionalNumberArg = (args: unknown, key: string): number | undefined => {
  const value = asObject(args)[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Argument ${key} must be a number`);
  }
  return value;
};

export const optionalBooleanArg = (args: unknown, key: string): boolean | undefined => {
  const value = asObject(args)[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`Argument ${key} must be a boolean`);
  }
  return value;
};
