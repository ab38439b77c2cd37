/**
 * 動画アセットとして扱う拡張子一覧。
 */
export const VIDEO_EXTENSIONS = [
  '.mp4', '.mov', '.avi', '.mkv', '.webm', '.wmv', '.flv', '.m4v', '.3gp', '.mts', '.m2ts', '.mpeg', '.mpg',
];

/**
 * メディアアセット（画像 + 動画）として扱う拡張子一覧。
 */
export const MEDIA_EXTENSIONS = [
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.webp', '.heic', '.heif',
  '.cr2', '.cr3', '.crw', '.nef', '.arw', '.dng', '.tif', '.tiff',
  ...VIDEO_EXTENSIONS,
];

/**
 * アップロード URL を払い出すセッション作成エンドポイント。
 */
export const UPLOAD_SESSION_URL = 'https://photos.google.com/_/upload/uploadmedia/rupio/interactive';

/**
 * 写真の有効化やアルバム操作を送るエンドポイント。
 */
export const MUTATE_URL = 'https://photos.google.com/_/PhotosUi/mutate';

/**
 * アップロード済み画像の URL の接頭辞。
 */
export const IMAGE_URL_PREFIX = 'https://lh3.googleusercontent.com/';

export const ENABLE_PHOTO_RPC_ID = 73212720;
export const ALBUM_RPC_ID = 79956622;

/**
 * ミューテーション応答の先頭に付く XSSI 対策の接頭辞。
 */
export const XSSI_PREFIX = ")]}'";
