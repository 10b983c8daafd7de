/**
 * Sync marker carried on the last line of every card description the
 * reconciler writes: `[sync-ref:<namespace>:<sourceId>]`
 */

const MARKER_PATTERN = /\[sync-ref:([a-z0-9-]+):([^\]\s]+)\]\s*$/;

export function formatMarker(namespace: string, sourceId: string): string {
  return `[sync-ref:${namespace}:${sourceId}]`;
}

/**
 * The source id of a description's marker, when it belongs to `namespace`
 */
export function parseMarker(description: string, namespace: string): string | undefined {
  const match = MARKER_PATTERN.exec(description);
  if (!match || match[1] !== namespace) {
    return undefined;
  }
  return match[2];
}

/**
 * Append the marker to a description, replacing any marker already there
 */
export function withMarker(description: string, namespace: string, sourceId: string): string {
  const body = stripMarker(description).trimEnd();
  const marker = formatMarker(namespace, sourceId);
  return body === '' ? marker : `${body}\n\n${marker}`;
}

/**
 * The description without its trailing marker
 */
export function stripMarker(description: string): string {
  return description.replace(MARKER_PATTERN, '').trimEnd();
}
