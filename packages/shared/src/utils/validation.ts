// upstream video ids are 11 characters of url-safe base64
export function isValidVideoId(id: string): boolean {
  return /^[A-Za-z0-9_-]{10}[AEIMQUYcgkosw048]$/.test(id);
}
