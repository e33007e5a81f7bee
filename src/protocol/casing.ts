function words(name: string): string[] {
  return name.split('_').filter((word) => word !== '');
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** `received_date_time` -> `receivedDateTime` */
export function toCamelCase(name: string): string {
  const [first, ...rest] = words(name);
  if (first === undefined) return name;
  return first.charAt(0).toLowerCase() + first.slice(1) + rest.map(capitalize).join('');
}

/** `received_date_time` -> `ReceivedDateTime` */
export function toPascalCase(name: string): string {
  const parts = words(name);
  if (parts.length === 0) return name;
  return parts.map(capitalize).join('');
}
