export enum StatefulStackExportsEnum {
  ARTICLE_STREAM_NAME = "ArticleStreamName",
  ARTICLE_STREAM_ARN = "ArticleStreamArn",
  GUARDIAN_API_KEY_SECRET_NAME = "GuardianApiKeySecretName",
  GUARDIAN_API_KEY_SECRET_ARN = "GuardianApiKeySecretArn",
}
