import { z } from 'zod';

export const oauthGrantSchema = z.object({
    openid: z.string().min(1),
    access_token: z.string().min(1),
    expires_in: z.number(),
    refresh_token: z.string().min(1),
    scope: z.string().optional(),
    unionid: z.string().optional()
});

export const refreshedGrantSchema = oauthGrantSchema.extend({
    openid: z.string().min(1).optional()
});

/** Profile returned by the user-token endpoint; unknown fields are kept. */
export const userProfileSchema = z
    .object({
        openid: z.string().min(1),
        nickname: z.string().optional(),
        sex: z.number().optional(),
        province: z.string().optional(),
        city: z.string().optional(),
        country: z.string().optional(),
        headimgurl: z.string().optional(),
        privilege: z.array(z.string()).optional(),
        unionid: z.string().optional()
    })
    .passthrough();

export const extendedUserInfoSchema = z
    .object({
        subscribe: z.number(),
        openid: z.string().optional(),
        language: z.string().optional(),
        remark: z.string().optional(),
        groupid: z.number().optional(),
        subscribe_time: z.number().optional()
    })
    .passthrough();

export const groupSchema = z.object({
    id: z.number(),
    name: z.string(),
    count: z.number().default(0)
});

export const groupListSchema = z.object({ groups: z.array(groupSchema) });

export const createdGroupSchema = z.object({ group: groupSchema });

export const qrcodeTicketSchema = z.object({
    ticket: z.string().min(1),
    expire_seconds: z.number().optional(),
    url: z.string().optional()
});

export const shortUrlSchema = z.object({ short_url: z.string().min(1) });

export const clientCredentialSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number()
});

export const apiStatusSchema = z.object({
    errcode: z.number().optional(),
    errmsg: z.string().optional()
});

export type OAuthGrant = z.infer<typeof oauthGrantSchema>;
export type RefreshedGrant = z.infer<typeof refreshedGrantSchema>;
export type UserProfile = z.infer<typeof userProfileSchema>;
export type ExtendedUserInfo = z.infer<typeof extendedUserInfoSchema>;
export type Group = z.infer<typeof groupSchema>;
export type QrcodeTicket = z.infer<typeof qrcodeTicketSchema>;
