import { z } from 'zod';

/**
 * OAuth2 Token Response
 * Yahoo 另外回傳 id_token、xoauth_yahoo_guid 等欄位，原樣保留
 */
export const TokenRecordSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    token_type: z.string(),
    expires_in: z.number().int(),
  })
  .passthrough();

export type TokenRecord = z.infer<typeof TokenRecordSchema>;

/**
 * Refresh 回應可省略 refresh_token（沿用舊的）
 */
export const RefreshTokenResponseSchema = TokenRecordSchema.extend({
  refresh_token: z.string().min(1).optional(),
}).passthrough();

/**
 * OpenID userinfo 回應：任意 JSON 物件
 */
export const ProfileRecordSchema = z.record(z.unknown());

export type ProfileRecord = z.infer<typeof ProfileRecordSchema>;

/**
 * 撤銷授權的原始回應
 */
export interface RevokeResult {
  status: number;
  body: string;
}
