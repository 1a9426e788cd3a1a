import { REWARD_TYPES, type RewardType, type WalletCurrency } from '../../types.js';

export function isRewardType(value: string): value is RewardType {
  return REWARD_TYPES.some(type => type === value);
}

/** Currency a reward type is paid in */
export function currencyForRewardType(type: RewardType): WalletCurrency {
  switch (type) {
    case 'LOYALTY_POINTS':
      return 'LP';
    case 'REWARD_POINTS':
      return 'RP';
    case 'BONUS_BALANCE':
    case 'FREE_PLAY':
    case 'CASHBACK':
      return 'BONUS';
    case 'TICKETS':
      return 'TICKETS';
    default: {
      const unhandled: never = type;
      throw new Error(`Unhandled reward type: ${String(unhandled)}`);
    }
  }
}
