export const toErrorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export const escapeCsvField = (value: string | number) => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
};
