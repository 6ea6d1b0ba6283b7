import 'dotenv/config';
import { compileWorkflow } from '../../compiler/compile.js';
import { defaultPalette } from '../../palette/load.js';
import { writeJson } from '../../io/files.js';
import workflow from './workflow.json' with { type: 'json' };

async function main() {
  const result = compileWorkflow(workflow, {
    palette: defaultPalette(),
    maxRoutingDepth: Number(process.env.MAX_ROUTING_DEPTH || 1),
    idSeed: process.env.ID_SEED || 'appointment-demo'
  });

  console.log('\n[Routing plans]');
  for (const plan of result.plans.values()) {
    console.log(`• ${plan.branchNodeId}: classifier ${plan.classifierInstanceId}, gates ${plan.gateInstanceIds.join(' → ')}`);
    for (const leg of plan.legs) {
      console.log(`    ${leg.gateInstanceId}.${leg.gatePort} → ${leg.edge.toNodeId}`);
    }
  }

  const out = process.env.OUT || 'runs/appointment_pipeline.json';
  await writeJson(out, result.document);
  console.log(`\nWrote ${out} (${result.stats.instances} components, ${result.stats.connections} connections).`);
}

main().catch(e => { console.error(e); process.exit(1); });
