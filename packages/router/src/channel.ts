/**
 * Channel naming: the identifier the messaging engine delivers to for a given address.
 * Any replacement must stay deterministic and must not map two addresses onto one channel.
 */
export type ChannelNamer = (address: string) => string

export const channelName: ChannelNamer = (address) => address.replace(/\./g, '_')
