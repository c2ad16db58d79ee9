export function nowISO(): string {
  return new Date().toISOString();
}
