export interface ParsedAddress {
     city: string;
     district: string;
     ward: string;
}

export const DEFAULT_CITY = 'Ho Chi Minh City';

// Checked in order; the first city with a matching alias wins.
const KNOWN_CITIES: ReadonlyArray<{ city: string; aliases: readonly string[] }> = [
     { city: 'Ho Chi Minh City', aliases: ['ho chi minh', 'hồ chí minh', 'hcm', 'saigon', 'sài gòn'] },
     { city: 'Hanoi', aliases: ['hanoi', 'ha noi', 'hà nội'] },
     { city: 'Da Nang', aliases: ['da nang', 'đà nẵng'] },
     { city: 'Can Tho', aliases: ['can tho', 'cần thơ'] },
     { city: 'Hai Phong', aliases: ['hai phong', 'hải phòng'] },
];

const DISTRICT_PATTERN = /(?:district|quận)\s*(\d+)/;

/**
 * Coarse city/district classification of a free-text address, used to shape the
 * shipment payload. Not a geocoder: unknown input falls back to the default city.
 */
export function parseAddress(address: string | null | undefined): ParsedAddress {
     if (!address) {
          return { city: DEFAULT_CITY, district: '', ward: '' };
     }

     const normalized = address.normalize('NFC').toLowerCase();

     const match = KNOWN_CITIES.find(({ aliases }) =>
          aliases.some((alias) => normalized.includes(alias))
     );

     const districtMatch = DISTRICT_PATTERN.exec(normalized);

     return {
          city: match ? match.city : DEFAULT_CITY,
          district: districtMatch ? `District ${districtMatch[1]}` : '',
          ward: '',
     };
}
