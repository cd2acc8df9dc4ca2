import 'dotenv/config';
import readline from 'node:readline/promises';
import { createServices } from '../src/bootstrap';
import { MissingMaterialsError, errorMessage } from '../src/lib/errors';
import { quoteRequestSchema } from '../src/schemas/quotes.schema';
import { INPUT_DEFAULTS } from '../src/services/quotes.service';

type Prompt = (question: string, fallback?: string) => Promise<string>;

function createPrompt(rl: readline.Interface): Prompt {
  return async (question, fallback) => {
    const suffix = fallback === undefined ? '' : ` [${fallback}]`;
    const answer = (await rl.question(`${question}${suffix}: `)).trim();
    return answer || fallback || '';
  };
}

async function askJobType(ask: Prompt, jobTypes: string[]): Promise<string> {
  for (;;) {
    const answer = await ask(`Job type (${jobTypes.join(', ')})`);
    if (jobTypes.includes(answer)) return answer;
    console.log(`Unknown job type. Choose one of: ${jobTypes.join(', ')}`);
  }
}

async function askQuantity(ask: Prompt): Promise<number> {
  for (;;) {
    const quantity = Number(await ask('Quantity'));
    if (Number.isInteger(quantity) && quantity > 0) return quantity;
    console.log('Quantity must be a whole number greater than 0.');
  }
}

async function main() {
  const services = await createServices();
  const { quotes } = services;
  const { defaults } = quotes;
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const ask = createPrompt(rl);

  try {
    const jobTypes = await quotes.listJobTypes();
    if (jobTypes.source === 'fallback') {
      console.log(`(BOM service unavailable, using built-in job types: ${jobTypes.reason ?? 'unknown reason'})`);
    }

    const jobType = await askJobType(ask, jobTypes.jobTypes);
    const quantity = await askQuantity(ask);
    const request = quoteRequestSchema.parse({
      jobType,
      quantity,
      dueDate: await ask('Due date', INPUT_DEFAULTS.dueDate),
      companyName: await ask('Company name', INPUT_DEFAULTS.companyName),
      customerName: await ask('Customer name', INPUT_DEFAULTS.customerName),
      customerEmail: await ask('Customer email', INPUT_DEFAULTS.customerEmail),
      currency: await ask('Currency', defaults.currency),
      laborRate: await ask('Labor rate per hour', String(defaults.laborRate)),
      markupPct: await ask('Markup (0.3 or 30)', String(defaults.markupPct)),
      vatPct: await ask('VAT (0.2 or 20)', String(defaults.vatPct)),
      notes: await ask('Notes', INPUT_DEFAULTS.notes)
    });

    const inputs = quotes.resolveInputs(request);
    const computed = await quotes.computeQuote(inputs);
    const { summary } = computed;

    console.log('\nQuote summary');
    console.log(`  Materials subtotal: ${summary.materialsSubtotal} ${inputs.currency}`);
    console.log(`  Labor (${summary.laborHours} h): ${summary.laborCost} ${inputs.currency}`);
    console.log(`  Subtotal: ${summary.subtotal} ${inputs.currency}`);
    console.log(`  Markup: ${summary.markupValue} ${inputs.currency}`);
    console.log(`  VAT: ${summary.vatValue} ${inputs.currency}`);
    console.log(`  Total: ${summary.total} ${inputs.currency} (${summary.unitPrice} per unit)`);
    for (const warning of computed.warnings) {
      console.log(`  ⚠ ${warning}`);
    }

    const built = await quotes.buildQuote(inputs, computed);
    console.log(`\n✓ Quote ${built.record.quoteId} written:`);
    for (const file of [built.files.markdownPath, built.files.textPath, built.files.pdfPath]) {
      console.log(`  ${file}`);
    }
    for (const delivery of built.deliveries) {
      console.log(`  ${delivery}`);
    }
  } catch (error: unknown) {
    if (error instanceof MissingMaterialsError) {
      console.error(error.message);
      console.error('Please add missing materials and retry.');
    } else {
      console.error('Quote failed:', errorMessage(error));
    }
    process.exitCode = 1;
  } finally {
    rl.close();
    await services.close();
  }
}

main().catch((error: unknown) => {
  console.error('Quote failed:', errorMessage(error));
  process.exit(1);
});
