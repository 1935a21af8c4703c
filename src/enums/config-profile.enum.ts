/**
 * Cost/quality tiers used by the recommended chunking and embedding configs
 */
export enum ConfigProfileEnum {
  ECONOMY = 'economy',
  STANDARD = 'standard',
  PREMIUM = 'premium',
}

export function isConfigProfile(value: string): value is ConfigProfileEnum {
  return Object.values<string>(ConfigProfileEnum).includes(value);
}
