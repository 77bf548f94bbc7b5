import { UNKNOWN_LABEL } from '@/types/anilist';

export interface CountryInfo {
  country: string;
  language: string;
}

// ISO 3166-1 alpha-3 codes as returned by AniList's countryOfOrigin
export const COUNTRY_MAP: Readonly<Record<string, CountryInfo>> = {
  JPN: { country: 'Japan', language: 'Japanese' },
  KOR: { country: 'South Korea', language: 'Korean' },
  CHN: { country: 'China', language: 'Chinese' },
  TWN: { country: 'Taiwan', language: 'Chinese' },
  USA: { country: 'United States', language: 'English' },
  CAN: { country: 'Canada', language: 'English' },
  GBR: { country: 'United Kingdom', language: 'English' },
  AUS: { country: 'Australia', language: 'English' },
  FRA: { country: 'France', language: 'French' },
  DEU: { country: 'Germany', language: 'German' },
  ESP: { country: 'Spain', language: 'Spanish' },
  ITA: { country: 'Italy', language: 'Italian' },
  BRA: { country: 'Brazil', language: 'Portuguese' },
  MEX: { country: 'Mexico', language: 'Spanish' },
  RUS: { country: 'Russia', language: 'Russian' },
  IND: { country: 'India', language: 'Hindi' },
  PHL: { country: 'Philippines', language: 'Filipino' },
  THA: { country: 'Thailand', language: 'Thai' },
  VNM: { country: 'Vietnam', language: 'Vietnamese' },
};

/**
 * Resolve a country code to a display country and main language.
 * Unrecognized codes keep the code as the country name.
 */
export function resolveCountry(code: string | null | undefined): CountryInfo {
  if (!code) {
    return { country: UNKNOWN_LABEL, language: UNKNOWN_LABEL };
  }
  if (Object.prototype.hasOwnProperty.call(COUNTRY_MAP, code)) {
    return COUNTRY_MAP[code];
  }
  return { country: code, language: UNKNOWN_LABEL };
}
