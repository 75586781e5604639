/** A catalog entry as read from the iPod database. Numeric fields are already parsed. */
export interface Track {
  id: number;
  title: string;
  album: string;
  /** 0 = unrated, 20 = never select */
  rating: number;
  playCount: number;
  /** Mac epoch seconds; 0 = never played */
  lastPlayed: number;
}

export interface WeightedTrack extends Track {
  /** 1 = most recently played */
  recencyRank: number;
  weight: number;
}
