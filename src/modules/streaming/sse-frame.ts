import { StreamFragment } from './stream-fragment.interface';

/**
 * Frame a fragment as `event: <name>\ndata: <payload>\n\n`, or a bare
 * `data:` frame when the fragment has no event name
 */
export function frameFragment(fragment: StreamFragment): string {
  const payload =
    typeof fragment.data === 'string'
      ? fragment.data
      : JSON.stringify(fragment.data);

  if (fragment.event) {
    return `event: ${fragment.event}\ndata: ${payload}\n\n`;
  }
  return `data: ${payload}\n\n`;
}
