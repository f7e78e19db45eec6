#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';

import { createNetworkApp } from './src/NetworkApp';

const app = new cdk.App();
createNetworkApp(app);
