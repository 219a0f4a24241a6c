import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";
import { fileURLToPath } from "url";
import * as iam from "aws-cdk-lib/aws-iam";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as nodeLambda from "aws-cdk-lib/aws-lambda-nodejs";
import { OutputFormat } from "aws-cdk-lib/aws-lambda-nodejs";
import { StatefulStackExportsEnum } from "./enums/exports-enum.js";

const handlerEntry = fileURLToPath(
  new URL("../../backend/nodejs/src/lambdas/stream-articles.ts", import.meta.url)
);

/**
 * Guardian Article Stream - Stateless Stack
 *
 * One on-demand function: search the Guardian API, publish the results to
 * the Kinesis stream owned by the stateful stack.
 */
export class ArticleStreamStatelessStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props?: cdk.StackProps) {
    super(scope, id, props);

    const streamArn = cdk.Fn.importValue(
      StatefulStackExportsEnum.ARTICLE_STREAM_ARN
    );
    const secretArn = cdk.Fn.importValue(
      StatefulStackExportsEnum.GUARDIAN_API_KEY_SECRET_ARN
    );

    const powertoolsLayer = lambda.LayerVersion.fromLayerVersionArn(
      this,
      "PowertoolsLayer",
      `arn:aws:lambda:${this.region}:094274105915:layer:AWSLambdaPowertoolsTypeScriptV2:34`
    );

    const streamArticles = new nodeLambda.NodejsFunction(
      this,
      "StreamArticles",
      {
        handler: "streamArticlesHandler",
        entry: handlerEntry,
        description: "Search Guardian articles and publish them to Kinesis",
        memorySize: 256,
        timeout: cdk.Duration.seconds(30),
        runtime: lambda.Runtime.NODEJS_20_X,
        architecture: lambda.Architecture.ARM_64,
        layers: [powertoolsLayer],
        tracing: lambda.Tracing.ACTIVE,
        environment: {
          GUARDIAN_API_KEY_SECRET_NAME: cdk.Fn.importValue(
            StatefulStackExportsEnum.GUARDIAN_API_KEY_SECRET_NAME
          ),
          KINESIS_STREAM_NAME: cdk.Fn.importValue(
            StatefulStackExportsEnum.ARTICLE_STREAM_NAME
          ),
          PUBLISH_MAX_ATTEMPTS: "3",
          PUBLISH_BASE_DELAY_MS: "100",
          // Leaves headroom under the function timeout for the error response
          INVOCATION_TIMEOUT_MS: "25000",
          POWERTOOLS_SERVICE_NAME: "guardian-article-stream",
          POWERTOOLS_LOG_LEVEL: "INFO",
        },
        bundling: {
          minify: true,
          sourceMap: true,
          format: OutputFormat.ESM,
          target: "node20",
          externalModules: [
            "@aws-sdk/*",
            "@aws-lambda-powertools/logger",
            "@aws-lambda-powertools/parameters",
          ],
        },
      }
    );

    streamArticles.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ["secretsmanager:GetSecretValue"],
        resources: [secretArn],
      })
    );

    streamArticles.addToRolePolicy(
      new iam.PolicyStatement({
        actions: [
          "kinesis:DescribeStreamSummary",
          "kinesis:PutRecord",
          "kinesis:PutRecords",
        ],
        resources: [streamArn],
      })
    );

    new cdk.CfnOutput(this, "StreamArticlesFunctionName", {
      value: streamArticles.functionName,
      description: "Invoke with {\"search_term\": \"...\", \"date_from\": \"YYYY-MM-DD\"}",
    });

    cdk.Tags.of(this).add("Project", "GuardianArticleStream");
    cdk.Tags.of(this).add("ManagedBy", "CDK");
  }
}
