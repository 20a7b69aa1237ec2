import type { Network } from "@lucid-evolution/lucid";

export type SlotConfig = {
  zeroTime: number;
  zeroSlot: number;
  slotLength: number;
};

/**
 * Given the network, this function returns its Shelley-era slot
 * configuration. `Custom` networks (emulators, private testnets) start at the
 * POSIX epoch with one-second slots unless the deployment overrides it.
 */
export const getSlotConfig = (network: Network): SlotConfig => {
  switch (network) {
    case "Mainnet":
      return { zeroTime: 1596059091000, zeroSlot: 4492800, slotLength: 1000 };
    case "Preview":
      return { zeroTime: 1666656000000, zeroSlot: 0, slotLength: 1000 };
    case "Preprod":
      return {
        zeroTime: 1654041600000 + 1728000000,
        zeroSlot: 86400,
        slotLength: 1000,
      };
    case "Custom":
      return { zeroTime: 0, zeroSlot: 0, slotLength: 1000 };
  }
};

export const posixToSlot = (time: number, config: SlotConfig): number =>
  Math.floor((time - config.zeroTime) / config.slotLength) + config.zeroSlot;
