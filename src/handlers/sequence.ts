/**
 * Keys for `sequentialize`: updates sharing a chat or a sender run one after
 * another, everything else runs concurrently.
 */
export function updateSequenceKeys(ctx: { chat?: { id: number }; from?: { id: number } }): string[] {
  return [ctx.chat?.id, ctx.from?.id]
    .filter((id): id is number => typeof id === 'number')
    .map((id) => `${id}`);
}
