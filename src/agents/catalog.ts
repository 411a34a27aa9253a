/**
 * Prompt Catalog
 *
 * Fixed mapping from (agent, operation) to a system instruction and a prompt
 * template. Templates only substitute values; nothing branches on content.
 */

export interface PromptTemplate<A extends unknown[]> {
  systemInstruction: string;
  build: (...args: A) => string;
}

/**
 * A template with its values substituted, ready for the gateway
 */
export interface RenderedPrompt {
  systemInstruction: string;
  userPrompt: string;
}

export function renderPrompt<A extends unknown[]>(
  entry: PromptTemplate<A>,
  ...args: A
): RenderedPrompt {
  return {
    systemInstruction: entry.systemInstruction,
    userPrompt: entry.build(...args),
  };
}

function template<A extends unknown[]>(
  systemInstruction: string,
  build: (...args: A) => string
): PromptTemplate<A> {
  return { systemInstruction, build };
}

const GBP = new Intl.NumberFormat('en-GB', { maximumFractionDigits: 0 });

/**
 * Format an amount as whole pounds, e.g. 500000 -> "£500,000"
 */
export function formatPounds(amount: number): string {
  return `£${GBP.format(amount)}`;
}

export const DEFAULT_ANNUAL_REVENUE = 50_000_000;

export const VALUE_PROPOSITION =
  'We help mid-market companies implement AI-driven consulting solutions that reduce costs by 70%';

export const PROMPT_CATALOG = {
  data_research: {
    enrichCompany: template(
      'You are a company research specialist. Provide accurate company information.',
      (companyName: string) => `Provide a concise company profile for ${companyName}. Include:
1. Industry and sector
2. Estimated company size
3. Key business focus
4. Potential pain points

Be realistic and factual.`
    ),
    screenPii: template(
      'You are a GDPR compliance specialist.',
      (text: string) => `Analyze this text for PII (personally identifiable information):

${text}

List any PII found and rate GDPR compliance risk (low/medium/high).`
    ),
  },

  engagement: {
    qualifyLead: template(
      'You are a sales qualification specialist.',
      (company: string, budget: string, timeline: string) => `Qualify this lead using BANT framework:

Company: ${company}
Budget: ${budget}
Timeline: ${timeline}

Provide:
1. BANT score (0-10)
2. Qualified status (Yes/No/Maybe)
3. Key risks or opportunities
4. Recommendation`
    ),
    generateEmail: template(
      'You are a B2B sales professional.',
      (company: string, contactName: string) => `Write a professional outreach email to ${contactName} at ${company} about:

"${VALUE_PROPOSITION}"

Make it personalized but concise (200 words max).`
    ),
  },

  discovery: {
    generateQuestions: template(
      'You are an expert business consultant.',
      (companyContext: string) => `Generate 10 strategic discovery questions for ${companyContext}

Focus on:
1. Current processes and pain points
2. Technology stack
3. Team structure
4. Budget constraints
5. Success metrics

Format as numbered list with brief context for each.`
    ),
  },

  synthesis: {
    calculateRoi: template(
      'You are a financial analyst.',
      (investmentAmount: number, annualRevenue: number) => `Calculate ROI for a ${formatPounds(investmentAmount)} consulting engagement.

Assumptions:
- Client annual revenue: ${formatPounds(annualRevenue)}
- Implementation period: 6 months
- Benefits realization: 12 months

Provide 3 scenarios:
1. Conservative (20% efficiency gain)
2. Recommended (35% efficiency gain)
3. Aggressive (50% efficiency gain)

For each, show:
- Annual savings
- Payback period
- 3-year ROI %
- Key assumptions`
    ),
  },

  project_delivery: {
    createProjectPlan: template(
      'You are a project management expert.',
      (projectName: string, scope: string) => `Create a project delivery plan for: ${projectName}

Scope: ${scope}

Provide:
1. 5-phase breakdown
2. Timeline (weeks)
3. Key deliverables
4. Resource requirements
5. Risk assessment
6. Success criteria

Format as structured plan.`
    ),
  },

  orchestrator: {
    solveTask: template(
      'You are an expert in orchestrating AI agents to solve business problems.',
      (
        title: string,
        description: string,
        agentChain: string,
        companyContext: string
      ) => `You are orchestrating the following task:

**Task**: ${title}
**Description**: ${description}
**Agent Chain**: ${agentChain}

**Company Context**: ${companyContext}

Provide a detailed implementation plan that includes:

1. **Agent Orchestration Steps** (what each agent does, in sequence)
2. **Data Flow** (how data moves between agents)
3. **Key Outputs** (what gets delivered at each step)
4. **Timeline** (realistic weeks/months)
5. **Resource Requirements** (people, tools, infrastructure)
6. **Expected ROI/Impact** (time saved, cost reduction, quality improvement)
7. **Risks & Mitigation** (what could go wrong, how to prevent)
8. **Success Metrics** (how to measure if it worked)

Be specific and actionable.`
    ),
    recommendWorkflow: template(
      'You are an expert business consultant who designs agent orchestration workflows to solve real problems.',
      (scenario: string) => `A company has the following business challenge:

${scenario}

Recommend an optimal agent orchestration workflow:

1. **Analysis** - What's the core problem and how do agents solve it?
2. **Agent Selection** - Which agents? In what order? Why?
3. **Orchestration Flow** - Draw the data flow and agent sequence
4. **Timeline** - How long will this take?
5. **Team & Skills** - Who needs to be involved?
6. **Cost Structure** - What will this cost to implement?
7. **Expected Impact** - What metrics will improve?
8. **First 90 Days** - What's the implementation roadmap?

Focus on solving their BUSINESS PROBLEM, not describing agents.`
    ),
  },
} as const;
