export {
  createSharingClient,
  DEFAULT_PAGE_SIZE,
  UNITY_CATALOG_API_PREFIX,
  type FetchLike,
  type ListInput,
  type SharingClient,
  type SharingClientOptions
} from './client';
export {
  SharingApiError,
  SharingTransportError,
  sharingTransportErrorCodes,
  type SharingTransportErrorCode
} from './errors';
export {
  authenticationTypes,
  DataObjectTypeSchema,
  dataObjectTypes,
  IpAccessListSchema,
  ListRecipientsResponseSchema,
  ListSharesResponseSchema,
  RecipientInfoSchema,
  RecipientTokenSchema,
  SharedDataObjectSchema,
  ShareInfoSchema,
  type AuthenticationType,
  type CreateRecipientInput,
  type CreateShareInput,
  type DataObjectType,
  type IpAccessList,
  type RecipientInfo,
  type RecipientToken,
  type SharedDataObject,
  type SharedDataObjectUpdate,
  type ShareInfo,
  type UpdateRecipientInput,
  type UpdateShareInput
} from './schemas';
