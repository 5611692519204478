export type ImgurPrivacy = 'public' | 'hidden' | 'secret';

export interface ImgurImage {
  id: string;
  title: string | null;
  description: string | null;
  datetime: number;
  type: string;
  animated: boolean;
  width: number;
  height: number;
  size: number;
  deletehash: string;
  name: string;
  link: string;
}

/**
 * POST /album answers with only the new album's identifiers
 */
export interface ImgurCreatedAlbum {
  id: string;
  deletehash?: string;
}

export interface ImgurApiResponse<T> {
  data: T;
  success: boolean;
  status: number;
}

export interface ImgurCreateAlbumBody {
  ids: string[];
  title: string;
  description: string;
  privacy: ImgurPrivacy;
}
