import { decode } from 'html-entities';

/**
 * Decode the HTML entities in video titles and descriptions.
 */
export const decodeHtmlEntities = (text: string): string => decode(text, { level: 'html5' });

/**
 * Caption lines arrive XML-escaped on top of their HTML escaping (`&amp;#39;`),
 * so they are decoded twice.
 */
export const decodeCaptionText = (text: string): string => decodeHtmlEntities(decodeHtmlEntities(text));
