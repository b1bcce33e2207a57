let appName = '';

export function getAppName(): string {
  if (!appName) {
    appName = process.env.APP_NAME ?? 'konbini-invoice';
  }

  return appName;
}

function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.substring(1);
}

export function prettyAppName(): string {
  return capitalize(getAppName().split('-').join(' '));
}
