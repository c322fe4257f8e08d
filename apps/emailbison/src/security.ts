export function redactToken(token: string, keep = 4): string {
  if (!token) return "";
  if (token.length <= keep) return "*".repeat(token.length);
  return `${token.slice(0, keep)}…${"*".repeat(8)}`;
}

export function bearerHeaders(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

export function redactedBearer(token: string): string {
  return `Bearer ${redactToken(token)}`;
}
