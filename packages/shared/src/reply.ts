// What the API hands back to the chat transport for one inbound event.

export type ReplyLink = { text: string; url: string };

export interface OutboundMessage {
  text: string;
  /** Reply keyboard rows. Absent leaves the current keyboard; an empty array removes it. */
  keyboard?: string[][];
  links?: ReplyLink[];
  /** Level number whose picture the transport should attach, if it has one. */
  level_image?: number;
}

export interface Reply {
  messages: OutboundMessage[];
}

export function reply(...messages: OutboundMessage[]): Reply {
  return { messages };
}
