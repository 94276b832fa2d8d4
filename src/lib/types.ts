export interface Coordinates {
  lat: number;
  lng: number;
}

export interface MuseumRecord {
  name: string;
  latitude: number;
  longitude: number;
  city: string;
  imageUrl?: string;
}

export interface TripStop extends MuseumRecord {
  distance: number;
}

export interface CityMuseums {
  city: string;
  museums: MuseumRecord[];
}

export type StartLocationResult = { ok: true; coordinates: Coordinates } | { ok: false; error: string };
