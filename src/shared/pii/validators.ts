export function digitsOnly(value: string): string {
  return value.replace(/\D/g, '');
}

export function isLikelyIpv4(value: string): boolean {
  const parts = value.split('.');
  if (parts.length !== 4) {
    return false;
  }

  return parts.every((part) => {
    if (!/^\d{1,3}$/.test(part)) {
      return false;
    }
    const parsed = Number(part);
    return parsed >= 0 && parsed <= 255;
  });
}

export function isValidHostname(value: string): boolean {
  const labels = value.split('.');
  if (labels.length < 2) {
    return false;
  }

  const tld = labels[labels.length - 1] ?? '';
  if (!/^[A-Za-z]{2,}$/.test(tld)) {
    return false;
  }

  return labels.every((label) => label.length > 0
    && label.length <= 63
    && !label.startsWith('-')
    && !label.endsWith('-'));
}

export function isPlausiblePhone(value: string, minDigits: number, maxDigits: number): boolean {
  const digits = digitsOnly(value);
  return digits.length >= minDigits && digits.length <= maxDigits;
}
