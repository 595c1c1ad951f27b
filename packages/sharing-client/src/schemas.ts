import {z} from 'zod';

export const dataObjectTypes = ['TABLE', 'VIEW', 'SCHEMA'] as const;
export const DataObjectTypeSchema = z.enum(dataObjectTypes);
export type DataObjectType = z.infer<typeof DataObjectTypeSchema>;

export const SharedDataObjectSchema = z
  .object({
    name: z.string(),
    data_object_type: z.string().optional(),
    added_at: z.number().optional(),
    added_by: z.string().optional(),
    shared_as: z.string().optional(),
    status: z.string().optional(),
    comment: z.string().optional()
  })
  .passthrough();

export const ShareInfoSchema = z
  .object({
    name: z.string(),
    comment: z.string().optional(),
    owner: z.string().optional(),
    storage_root: z.string().optional(),
    storage_location: z.string().optional(),
    created_at: z.number().optional(),
    created_by: z.string().optional(),
    updated_at: z.number().optional(),
    updated_by: z.string().optional(),
    objects: z.array(SharedDataObjectSchema).optional()
  })
  .passthrough();

export const ListSharesResponseSchema = z
  .object({
    shares: z.array(ShareInfoSchema).optional(),
    next_page_token: z.string().optional()
  })
  .passthrough();

export const IpAccessListSchema = z
  .object({
    allowed_ip_addresses: z.array(z.string()).optional()
  })
  .passthrough();

export const RecipientTokenSchema = z
  .object({
    id: z.string().optional(),
    activation_url: z.string().optional(),
    expiration_time: z.number().optional(),
    created_at: z.number().optional(),
    created_by: z.string().optional(),
    updated_at: z.number().optional(),
    updated_by: z.string().optional()
  })
  .passthrough();

export const authenticationTypes = ['DATABRICKS', 'TOKEN'] as const;

export const RecipientInfoSchema = z
  .object({
    name: z.string(),
    authentication_type: z.string().optional(),
    comment: z.string().optional(),
    owner: z.string().optional(),
    activated: z.boolean().optional(),
    activation_url: z.string().optional(),
    data_recipient_global_metastore_id: z.string().optional(),
    sharing_code: z.string().optional(),
    ip_access_list: IpAccessListSchema.optional(),
    tokens: z.array(RecipientTokenSchema).optional(),
    expiration_time: z.number().optional(),
    created_at: z.number().optional(),
    created_by: z.string().optional(),
    updated_at: z.number().optional(),
    updated_by: z.string().optional()
  })
  .passthrough();

export const ListRecipientsResponseSchema = z
  .object({
    recipients: z.array(RecipientInfoSchema).optional(),
    next_page_token: z.string().optional()
  })
  .passthrough();

export const EmptyResponseSchema = z.object({}).passthrough();

export const ServiceErrorBodySchema = z
  .object({
    error_code: z.string().min(1).optional(),
    message: z.string().optional()
  })
  .passthrough();

export type SharedDataObject = z.infer<typeof SharedDataObjectSchema>;
export type ShareInfo = z.infer<typeof ShareInfoSchema>;
export type IpAccessList = z.infer<typeof IpAccessListSchema>;
export type RecipientToken = z.infer<typeof RecipientTokenSchema>;
export type RecipientInfo = z.infer<typeof RecipientInfoSchema>;
export type AuthenticationType = (typeof authenticationTypes)[number];

export type SharedDataObjectUpdate = {
  action: 'ADD' | 'REMOVE' | 'UPDATE';
  data_object: {
    name: string;
    data_object_type: DataObjectType;
  };
};

export type CreateShareInput = {
  name: string;
  comment?: string;
  storage_root?: string;
};

export type UpdateShareInput = {
  updates?: SharedDataObjectUpdate[];
  comment?: string;
};

export type CreateRecipientInput = {
  name: string;
  authentication_type: AuthenticationType;
  comment?: string;
  data_recipient_global_metastore_id?: string;
  sharing_code?: string;
  ip_access_list?: {allowed_ip_addresses: string[]};
  expiration_time?: number;
};

export type UpdateRecipientInput = {
  comment?: string;
  ip_access_list?: {allowed_ip_addresses: string[]};
  expiration_time?: number;
};
