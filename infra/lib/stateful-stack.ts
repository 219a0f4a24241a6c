import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";
import * as kinesis from "aws-cdk-lib/aws-kinesis";
import * as secretsmanager from "aws-cdk-lib/aws-secretsmanager";
import { StatefulStackExportsEnum } from "./enums/exports-enum.js";

export class ArticleStreamStatefulStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props?: cdk.StackProps) {
    super(scope, id, props);

    const stream = new kinesis.Stream(this, "ArticleStream", {
      streamName: "guardian-article-stream",
      streamMode: kinesis.StreamMode.PROVISIONED,
      shardCount: 1,
      retentionPeriod: cdk.Duration.hours(24),
      encryption: kinesis.StreamEncryption.MANAGED,
    });

    new cdk.CfnOutput(this, "ArticleStreamNameOutput", {
      value: stream.streamName,
      description: "Kinesis stream receiving article records",
      exportName: StatefulStackExportsEnum.ARTICLE_STREAM_NAME,
    });

    new cdk.CfnOutput(this, "ArticleStreamArnOutput", {
      value: stream.streamArn,
      description: "Kinesis stream ARN",
      exportName: StatefulStackExportsEnum.ARTICLE_STREAM_ARN,
    });

    // The value is set out of band: `aws secretsmanager put-secret-value`
    const apiKeySecret = new secretsmanager.Secret(this, "GuardianApiKeySecret", {
      secretName: "guardian-article-stream/guardian-api-key",
      description: "Guardian Open Platform API key (plain string)",
    });

    new cdk.CfnOutput(this, "GuardianApiKeySecretNameOutput", {
      value: apiKeySecret.secretName,
      description: "Secrets Manager secret holding the Guardian API key",
      exportName: StatefulStackExportsEnum.GUARDIAN_API_KEY_SECRET_NAME,
    });

    new cdk.CfnOutput(this, "GuardianApiKeySecretArnOutput", {
      value: apiKeySecret.secretArn,
      description: "Guardian API key secret ARN",
      exportName: StatefulStackExportsEnum.GUARDIAN_API_KEY_SECRET_ARN,
    });
  }
}
