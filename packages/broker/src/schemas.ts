import { z } from "zod";

const amount = z.number().finite().nullish();

export const loginResponseSchema = z.object({
	access_token: z.string().min(1),
	token_type: z.string().optional(),
});

export const accountSummarySchema = z.object({
	account: z.object({
		buyingPower: amount,
		grossPositionValue: amount,
		netLiquidation: amount,
	}),
});

export const positionsSchema = z.object({
	positions: z.array(
		z.object({
			symbol: z.string().min(1),
			position: z.number().finite(),
			avgCost: amount,
		})
	),
});
