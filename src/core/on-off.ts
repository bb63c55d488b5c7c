export type OnOffPayloads = {
  readonly on: string;
  readonly off: string;
};

export const AVAILABILITY_PAYLOADS: OnOffPayloads = { on: "online", off: "offline" };
export const BOOLEAN_PAYLOADS: OnOffPayloads = { on: "true", off: "false" };

export function onOffPayload(state: boolean, payloads: OnOffPayloads): string {
  return state ? payloads.on : payloads.off;
}
