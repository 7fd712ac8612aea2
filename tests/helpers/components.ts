/**
 * @arch hexgraph.test.helpers
 *
 * Component sets shared across tests.
 */
import type { ComponentEntryInput } from '../../src/core/registry/schema.js';
import { buildGraph } from '../../src/core/graph/builder.js';
import type { ArchitectureGraph } from '../../src/core/graph/graph.js';

/** A domain entity, its repository port and an adapter implementing it. */
export const userScenario: ComponentEntryInput[] = [
  { typeName: 'User', layer: 'domain', role: 'entity' },
  { typeName: 'UserRepository', layer: 'port', role: 'repository' },
  {
    typeName: 'InMemoryUserRepository',
    layer: 'adapter',
    role: 'adapter',
    dependencies: ['UserRepository'],
  },
];

/** An aggregate depending on a gateway nobody registered. */
export const missingGatewayScenario: ComponentEntryInput[] = [
  { typeName: 'Order', layer: 'domain', role: 'aggregate', dependencies: ['PaymentGateway'] },
];

/** A domain aggregate depending outward on an adapter. */
export const outwardScenario: ComponentEntryInput[] = [
  { typeName: 'OrderMapper', layer: 'adapter', role: 'adapter' },
  { typeName: 'Order', layer: 'domain', role: 'aggregate', dependencies: ['OrderMapper'] },
];

/**
 * A small but complete shop: every layer populated, one cycle
 * (OrderService <-> BillingService) and an unimplemented port (Notifier).
 */
export const shopScenario: ComponentEntryInput[] = [
  { typeName: 'Order', layer: 'domain', role: 'aggregate', modulePath: 'src/domain/order.ts', dependencies: ['OrderLine', 'Money'] },
  { typeName: 'OrderLine', layer: 'domain', role: 'entity', modulePath: 'src/domain/order-line.ts', dependencies: ['Money'] },
  { typeName: 'Money', layer: 'domain', role: 'value_object', modulePath: 'src/domain/money.ts' },
  { typeName: 'OrderRepository', layer: 'port', role: 'repository', modulePath: 'src/ports/order-repository.ts', dependencies: ['Order'] },
  { typeName: 'Notifier', layer: 'port', role: 'service', modulePath: 'src/ports/notifier.ts' },
  { typeName: 'PlaceOrder', layer: 'application', role: 'directive', modulePath: 'src/app/place-order.ts', dependencies: ['OrderService'] },
  { typeName: 'FindOrders', layer: 'application', role: 'query', modulePath: 'src/app/find-orders.ts', dependencies: ['OrderRepository'] },
  { typeName: 'OrderService', layer: 'application', role: 'service', modulePath: 'src/app/order-service.ts', dependencies: ['OrderRepository', 'BillingService', 'Notifier'] },
  { typeName: 'BillingService', layer: 'application', role: 'service', modulePath: 'src/app/billing-service.ts', dependencies: ['OrderService'] },
  { typeName: 'SqlOrderRepository', layer: 'adapter', role: 'adapter', modulePath: 'src/adapters/sql-order-repository.ts', dependencies: ['OrderRepository'] },
  { typeName: 'Database', layer: 'infrastructure', role: 'other', modulePath: 'src/infra/database.ts' },
];

export function graphOf(entries: ComponentEntryInput[]): ArchitectureGraph {
  return buildGraph(entries).graph;
}
