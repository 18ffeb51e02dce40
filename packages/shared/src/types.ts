export interface CanonicalCity {
  id: number;
  name: string;
}

export interface CanonicalPharmacy {
  id: number;
  cityId: number;
  name: string;
  address: string | null;
  phone: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface ValidityPeriod {
  startDate: string;
  endDate: string;
}

export interface OnDutyRoster extends ValidityPeriod {
  id: number;
  pharmacyIds: number[];
  createdAt: string;
  updatedAt: string;
}
