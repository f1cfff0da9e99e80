/** Accept either a bare id or a pasted URL wherever the tools take an id. */

export function extractVideoId(urlOrId: string): string {
  const input = urlOrId.trim();

  if (input.includes('youtu.be/')) {
    return input.split('youtu.be/')[1].split(/[?&#/]/)[0];
  }
  if (input.includes('youtube.com')) {
    if (input.includes('watch?v=')) {
      return input.split('watch?v=')[1].split(/[&#]/)[0];
    }
    const shorts = input.match(/\/(?:shorts|embed|live)\/([^/?&#]+)/);
    if (shorts) return shorts[1];
  }
  return input;
}

export type ChannelRef = { kind: 'id'; channelId: string } | { kind: 'handle'; handle: string };

export function parseChannelRef(urlOrId: string): ChannelRef {
  const input = urlOrId.trim();

  if (input.includes('youtube.com')) {
    const byId = input.match(/\/channel\/([^/?&#]+)/);
    if (byId) return { kind: 'id', channelId: byId[1] };

    const byHandle = input.match(/\/@([^/?&#]+)/);
    if (byHandle) return { kind: 'handle', handle: byHandle[1] };
  }
  if (input.startsWith('@')) {
    return { kind: 'handle', handle: input.slice(1) };
  }
  return { kind: 'id', channelId: input };
}
