const EXPLICIT_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

export const hasExplicitScheme = (url: string): boolean => {
  return EXPLICIT_SCHEME_PATTERN.test(url.trim());
};

export const isHttpUrl = (url: string): boolean => {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
};

/**
 * Authority of an absolute URL without credentials and without a leading
 * `www.` label, e.g. `https://www.example.com:8080/a` -> `example.com:8080`.
 */
export const extractMediaName = (url: string): string | undefined => {
  if (!hasExplicitScheme(url)) {
    return undefined;
  }

  let host: string;
  try {
    host = new URL(url.trim()).host;
  } catch {
    return undefined;
  }

  const mediaName = host.startsWith('www.') ? host.slice(4) : host;
  return mediaName.length > 0 ? mediaName : undefined;
};
