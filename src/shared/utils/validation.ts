const EMAIL_PATTERN = /^[\w.-]+@[\w.-]+\.\w+$/;
const PHONE_PATTERN = /^\+?\d{7,15}$/;

export function validateEmail(text: string): boolean {
  return EMAIL_PATTERN.test(text);
}

export function validatePhone(text: string): boolean {
  return PHONE_PATTERN.test(text);
}

export function sanitize(text: string): string {
  return text.trim();
}
