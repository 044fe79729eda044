import Joi from 'joi';
import { getAddress } from 'ethers';

/** Hex address, normalized to its checksum form. */
export const ethereumAddressSchema = Joi.string()
  .pattern(/^0x[a-fA-F0-9]{40}$/)
  .custom((value: string, helpers) => {
    try {
      return getAddress(value);
    } catch {
      return helpers.error('address.checksum');
    }
  })
  .messages({
    'string.pattern.base': 'Invalid Ethereum address format',
    'address.checksum': 'Address checksum is invalid'
  });

/** Wei amount as a decimal string (or a safe integer). */
export const weiAmountSchema = Joi.alternatives()
  .try(
    Joi.string().pattern(/^\d{1,78}$/),
    Joi.number().integer().min(0).max(Number.MAX_SAFE_INTEGER)
  )
  .messages({
    'alternatives.match': 'Amount must be a non-negative integer in wei, as a decimal string'
  });

const signatureSchema = Joi.string()
  .pattern(/^0x[a-fA-F0-9]{130}$/)
  .messages({ 'string.pattern.base': 'Signature must be a 65-byte hex string' });

const addressParams = Joi.object({
  address: ethereumAddressSchema.required()
});

export const challengeSchema = Joi.object({
  body: Joi.object({
    address: ethereumAddressSchema.required()
  })
});

export const loginSchema = Joi.object({
  body: Joi.object({
    address: ethereumAddressSchema.required(),
    signature: signatureSchema.required()
  })
});

export const refreshSchema = Joi.object({
  body: Joi.object({
    refreshToken: Joi.string().required()
  })
});

export const addressParamSchema = Joi.object({
  params: addressParams
});

export const createEscrowSchema = Joi.object({
  body: Joi.object({
    bettorA: ethereumAddressSchema.required(),
    bettorB: ethereumAddressSchema.required(),
    initialValue: weiAmountSchema.optional()
  })
});

export const depositSchema = Joi.object({
  params: addressParams,
  body: Joi.object({
    amount: weiAmountSchema.required()
  })
});

export const selectWinnerSchema = Joi.object({
  params: addressParams,
  body: Joi.object({
    candidate: ethereumAddressSchema.required()
  })
});

export const createMediatorSchema = Joi.object({
  body: Joi.object({
    priceFeed: ethereumAddressSchema.required(),
    heartbeat: Joi.number().integer().min(1).optional(),
    optionType: Joi.string().valid('PUT', 'CALL').required(),
    buyer: ethereumAddressSchema.required(),
    seller: ethereumAddressSchema.required(),
    strikePrice: weiAmountSchema.required(),
    expiration: Joi.number().integer().min(1).required()
  })
});

export const transferSchema = Joi.object({
  body: Joi.object({
    to: ethereumAddressSchema.required(),
    amount: weiAmountSchema.required()
  })
});

export const faucetSchema = Joi.object({
  params: addressParams,
  body: Joi.object({
    amount: weiAmountSchema.required()
  })
});

export const setFeedPriceSchema = Joi.object({
  params: addressParams,
  body: Joi.object({
    price: weiAmountSchema.required(),
    updatedAt: Joi.number().integer().min(1).optional()
  })
});
