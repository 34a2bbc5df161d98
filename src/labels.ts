const SERVICE_LABELS = new Map<string, string>([
  ["recycling", "♻️ Recycling collection"],
  ["refuse", "🗑️ Refuse (black bin) collection"],
  ["food", "🍎 Food waste collection"],
  ["garden", "🌿 Garden waste collection"],
]);

function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function resolveServiceLabel(serviceName: string): string {
  const known = SERVICE_LABELS.get(serviceName.trim().toLowerCase());
  if (known) {
    return known;
  }
  return `🗑️ ${toTitleCase(serviceName)} collection`;
}
