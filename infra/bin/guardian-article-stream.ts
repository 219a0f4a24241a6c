#!/usr/bin/env node
import * as cdk from "aws-cdk-lib";
import { ArticleStreamStatefulStack } from "../lib/stateful-stack.js";
import { ArticleStreamStatelessStack } from "../lib/stateless-stack.js";

const app = new cdk.App();

// Stateful stack - persistent resources (Kinesis stream, API key secret)
new ArticleStreamStatefulStack(app, "ArticleStreamStatefulStack", {
  env: {
    region: "eu-west-2",
  },
  description: "Stateful resources for the Guardian article stream",
});

// Stateless stack - ingestion Lambda function
new ArticleStreamStatelessStack(app, "ArticleStreamStatelessStack", {
  env: {
    region: "eu-west-2",
  },
  description: "Guardian article search to Kinesis ingestion function",
});
