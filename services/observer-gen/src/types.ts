export type Rgb = [number, number, number];

export interface RosterEntry {
  teamNumber: string;
  teamName: string;
}

export interface TeamSlot extends RosterEntry {
  shortName: string;
  imageFileName: string;
}

export interface ManifestRow {
  teamNumber: string;
  teamName: string;
  teamShortName: string;
  imageFileName: string;
  teamColor: string;
}
