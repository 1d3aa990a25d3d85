/**
 * Online marketplace reference architecture
 */

import type { GraphScope } from '../core/graph';

export const TITLE = 'Online Marketplace Architecture';

export function buildOnlineMarketplace(g: GraphScope): void {
  const [webClients, mobileClients, internet] = g.cluster('Clients', (c) => [
    c.createNode('Web Clients', 'browser'),
    c.createNode('Mobile Clients', 'mobile'),
    c.createNode('Internet', 'internet'),
  ]);

  const [apiGateway, waf, shield, iam] = g.cluster(
    'API Gateway & Security',
    (c) => [
      c.createNode('API Gateway', 'api-gateway'),
      c.createNode('AWS WAF', 'firewall'),
      c.createNode('AWS Shield', 'firewall'),
      c.createNode('AWS IAM', 'identity'),
    ],
  );

  const [cognito, lambdaAuthorizer] = g.cluster(
    'Authentication & Authorization',
    (c) => [
      c.createNode('AWS Cognito', 'identity'),
      c.createNode('Lambda Authorizer', 'authorizer'),
    ],
  );

  const services = g.cluster('Microservices', (c) => ({
    user: c.createNode('User Service', 'function'),
    product: c.createNode('Product Service', 'function'),
    order: c.createNode('Order Service', 'function'),
    payment: c.createNode('Payment Service', 'function'),
    notification: c.createNode('Notification Service', 'function'),
  }));

  const [rds, dynamodb, redis] = g.cluster('Databases', (c) => [
    c.createNode('Amazon RDS (PostgreSQL)', 'relational-store'),
    c.createNode('Amazon DynamoDB', 'document-store'),
    c.createNode('Amazon ElastiCache (Redis)', 'cache'),
  ]);

  const sqs = g.cluster('Message Queue', (c) =>
    c.createNode('Amazon SQS', 'queue'),
  );

  const [paymentProviders, externalInventory] = g.cluster(
    'Third-Party Integrations',
    (c) => [
      c.createNode('Third-Party Payment Providers', 'external'),
      c.createNode('External Inventory System', 'external'),
    ],
  );

  const [cloudwatch, xray] = g.cluster('Monitoring & Logging', (c) => [
    c.createNode('Amazon CloudWatch', 'monitoring'),
    c.createNode('AWS X-Ray', 'tracing'),
  ]);

  const allServices = [
    services.user,
    services.product,
    services.order,
    services.payment,
    services.notification,
  ];

  // Ingress
  g.path(webClients, internet, apiGateway);
  g.path(mobileClients, internet, apiGateway);

  // Authentication round trip
  g.connect(apiGateway, [cognito, lambdaAuthorizer]);
  g.connect(lambdaAuthorizer, apiGateway);

  g.connect(apiGateway, allServices);

  // Storage
  g.connect([services.user, services.order], rds);
  g.connect(services.product, [dynamodb, redis]);
  g.connect(services.order, redis);

  // Async work
  g.connect([services.order, services.product], sqs);
  g.connect(sqs, [services.notification, externalInventory]);

  g.connect(services.payment, paymentProviders);

  // Observability
  const observed = [...allServices, apiGateway, lambdaAuthorizer];
  g.connect(observed, cloudwatch);
  g.connect(observed, xray);

  // Security
  g.connect(apiGateway, [waf, shield, iam]);
}

