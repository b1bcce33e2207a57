export function maskName(name: string): string {
  const chars = Array.from(name);
  if (chars.length === 0) return '***';
  return `${chars[0]}***`;
}

export function maskPhoneNumber(phoneNumber: string): string {
  const [head, ...rest] = phoneNumber.split('-');
  if (rest.length === 0) return `${phoneNumber.substring(0, 2)}***`;
  return [head, ...rest.map(() => '***')].join('-');
}
