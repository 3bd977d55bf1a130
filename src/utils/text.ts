/**
 * Text utilities for name normalization and display
 */

export class TextUtils {
  /**
   * Lowercase, trim and collapse inner whitespace
   */
  static normalize(text: string): string {
    return text.trim().toLowerCase().replace(/\s+/g, ' ');
  }

  /**
   * "weekly sync with ops" → "Weekly Sync With Ops"
   */
  static titleCase(text: string): string {
    return text
      .split(/\s+/)
      .filter(word => word.length > 0)
      .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
      .join(' ');
  }

  static tokens(text: string): string[] {
    return TextUtils.normalize(text).split(' ').filter(token => token.length > 0);
  }

  /**
   * "john.smith" / "john_smith" → "John Smith"
   */
  static displayNameFromEmail(email: string): string {
    const localPart = email.split('@')[0] ?? email;
    return TextUtils.titleCase(localPart.replace(/[._]/g, ' '));
  }

  /**
   * ["A"] → "A", ["A", "B"] → "A and B", ["A", "B", "C"] → "A, B, and C"
   */
  static joinNames(names: string[]): string {
    if (names.length <= 1) return names.join('');
    if (names.length === 2) return `${names[0]} and ${names[1]}`;
    return `${names.slice(0, -1).join(', ')}, and ${names[names.length - 1]}`;
  }
}

const EMAIL_REGEX = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(email: string): boolean {
  return EMAIL_REGEX.test(email.trim());
}
