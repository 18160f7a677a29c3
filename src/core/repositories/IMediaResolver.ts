/**
 * Turns a media URL into something a self-contained document can embed
 */
export interface IMediaResolver {
  /**
   * Resolve to a data URI, or return the URL itself when the media cannot be fetched.
   * Never rejects.
   */
  inline(url: string): Promise<string>;
}
