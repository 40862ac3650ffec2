/**
 * Host and path shapes accepted as YouTube video URLs.
 * Each pattern is anchored at the start of the input only.
 */
const YOUTUBE_URL_PATTERNS = [
  /^(https?:\/\/)?(www\.)?(youtube|youtu|youtube-nocookie)\.(com|be)\//,
  /^(https?:\/\/)?(www\.)?youtu\.be\//,
  /^(https?:\/\/)?(www\.)?youtube\.com\/watch\?v=/,
  /^(https?:\/\/)?(www\.)?youtube\.com\/embed\//,
  /^(https?:\/\/)?(www\.)?youtube\.com\/v\//,
];

/**
 * Checks whether the input looks like a YouTube URL.
 * Doesn't check that the video exists.
 *
 * @example
 * isValidYoutubeUrl("https://youtu.be/abc123") // => true
 * isValidYoutubeUrl("https://vimeo.com/123")   // => false
 */
export function isValidYoutubeUrl(url: string): boolean {
  const candidate = url.trim();
  return YOUTUBE_URL_PATTERNS.some((pattern) => pattern.test(candidate));
}
