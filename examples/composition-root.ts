/**
 * @arch hexgraph.example
 *
 * Registering components in code instead of a manifest, then validating
 * and exporting the graph. Each bounded context contributes one module.
 */
import { ArchitectureEngine, defineComponents, getExporter, logger } from '../src/index.js';

const billing = defineComponents(
  { typeName: 'Invoice', layer: 'domain', role: 'aggregate', modulePath: 'src/billing/invoice.ts' },
  {
    typeName: 'InvoiceRepository',
    layer: 'port',
    role: 'repository',
    dependencies: ['Invoice'],
  },
  {
    typeName: 'IssueInvoice',
    layer: 'application',
    role: 'directive',
    dependencies: ['InvoiceRepository', 'Invoice'],
  }
);

const persistence = defineComponents({
  typeName: 'PostgresInvoiceRepository',
  layer: 'adapter',
  role: 'repository',
  dependencies: ['InvoiceRepository'],
});

function main(): void {
  const engine = new ArchitectureEngine([billing, persistence], {
    description: 'Billing context',
    validation: { expectedLayers: ['domain', 'port', 'application', 'adapter'] },
  });

  const report = engine.validate();
  if (report.passed) {
    logger.success(`${report.summary.violation} violations, ${report.summary.warning} warnings`);
  } else {
    logger.fail('Architecture check failed');
  }

  const snapshot = engine.current();
  if (!snapshot) return;

  const result = getExporter('mermaid').export(snapshot.graph);
  if (!result.ok) {
    logger.error('Export failed', result.error);
    return;
  }
  console.log(result.document);
}

main();
