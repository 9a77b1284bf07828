export {
  AccountSchema,
  CredentialAccountSchema,
  CustomEmojiSchema,
  FieldSchema,
} from "./account";
export type {
  Account,
  AccountSource,
  CredentialAccount,
  CustomEmoji,
  Field,
} from "./account";
export { StatusSchema } from "./status";
export type { Status, StatusMention, StatusTag } from "./status";
export { RelationshipSchema } from "./relationship";
export type { Relationship } from "./relationship";
export {
  FeaturedTagSchema,
  UserListSchema,
  FamiliarFollowersSchema,
  REPLIES_POLICIES,
} from "./lists";
export type {
  FeaturedTag,
  UserList,
  RepliesPolicy,
  FamiliarFollowers,
} from "./lists";
export { TokenSchema, ApplicationSchema, GrantType, Privacy } from "./oauth";
export type { Token, Application } from "./oauth";
export { MastodonErrorSchema } from "./error";
export type { MastodonError } from "./error";
