/**
 * HTML views
 *
 * Plain template functions. Every interpolated value goes through
 * escapeHtml; the embedded analysis JSON has `<` escaped so it cannot
 * close its script element.
 */

import { humanizeCategory } from '../content/insights';
import {
    EEAT_COMPONENTS,
    HumanInputPlan,
    PAIN_POINT_CATEGORIES,
    PipelineResult,
    QUALITY_FACTORS,
    StageName,
} from '../pipeline/types';

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

export function embedJson(value: unknown): string {
    return JSON.stringify(value).replace(/</g, '\\u003c');
}

const STYLES = `
body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif; max-width: 960px; margin: 0 auto; padding: 24px; color: #1f2933; background: #f7f9fb; }
h1 { margin-bottom: 4px; }
.card { background: #fff; border-radius: 8px; padding: 16px 20px; margin: 16px 0; box-shadow: 0 1px 3px rgba(0,0,0,0.08); }
label { display: block; font-weight: 600; margin-top: 12px; }
input, textarea { width: 100%; padding: 8px; margin-top: 4px; border: 1px solid #cbd2d9; border-radius: 4px; font: inherit; box-sizing: border-box; }
button { margin-top: 16px; padding: 10px 18px; background: #2563eb; color: #fff; border: 0; border-radius: 4px; font-weight: 600; cursor: pointer; }
table { border-collapse: collapse; width: 100%; }
td, th { text-align: left; padding: 4px 8px; border-bottom: 1px solid #e4e7eb; }
pre { white-space: pre-wrap; word-wrap: break-word; background: #f0f4f8; padding: 16px; border-radius: 4px; }
.fallback { color: #b45309; }
.live { color: #047857; }
#chat-log div { margin: 8px 0; white-space: pre-wrap; }
`;

function layout(title: string, body: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
<style>${STYLES}</style>
</head>
<body>
${body}
</body>
</html>
`;
}

interface FormField {
    name: string;
    label: string;
    placeholder: string;
    multiline?: boolean;
    optional?: boolean;
}

const FORM_FIELDS: FormField[] = [
    { name: 'topic', label: 'Topic', placeholder: 'best budget laptops for college students' },
    { name: 'target_communities', label: 'Reddit communities (comma separated)', placeholder: 'laptops, college, SuggestALaptop' },
    { name: 'industry', label: 'Industry', placeholder: 'Consumer electronics retail' },
    { name: 'target_audience', label: 'Target audience', placeholder: 'College students on a budget' },
    { name: 'business_type', label: 'Business type', placeholder: 'Independent computer store' },
    { name: 'content_goal', label: 'Content goal', placeholder: 'Drive in-store consultations' },
    { name: 'unique_value_prop', label: 'Unique value proposition', placeholder: 'What do you know that competitors do not?', multiline: true },
    { name: 'brand_voice', label: 'Brand voice', placeholder: 'Friendly, honest, no jargon' },
    { name: 'customer_pain_points', label: 'Customer pain points you hear', placeholder: 'One per line', multiline: true },
    { name: 'frequent_questions', label: 'Questions customers ask', placeholder: 'One per line', multiline: true },
    { name: 'success_story', label: 'Customer success story (optional)', placeholder: 'A real example', multiline: true, optional: true },
];

function renderField(field: FormField): string {
    const required = field.optional ? '' : ' required';
    const placeholder = escapeHtml(field.placeholder);
    const control = field.multiline
        ? `<textarea id="${field.name}" name="${field.name}" rows="3" placeholder="${placeholder}"${required}></textarea>`
        : `<input id="${field.name}" name="${field.name}" type="text" placeholder="${placeholder}"${required}>`;
    return `<label for="${field.name}">${escapeHtml(field.label)}</label>\n${control}`;
}

export function renderFormPage(): string {
    return layout('Customer Voice Content Engine', `
<h1>Customer Voice Content Engine</h1>
<p>Research real customer conversations, then generate content that speaks their language.</p>
<form class="card" method="post" action="/generate">
${FORM_FIELDS.map(renderField).join('\n')}
<button type="submit">Generate content</button>
</form>`);
}

function scoreRows(entries: Array<[string, number]>): string {
    return entries
        .map(([label, value]) => `<tr><td>${escapeHtml(label)}</td><td>${value.toFixed(1)}</td></tr>`)
        .join('\n');
}

function listItems(items: string[]): string {
    if (items.length === 0) {
        return '<p><em>None</em></p>';
    }
    return `<ul>${items.map(item => `<li>${escapeHtml(item)}</li>`).join('')}</ul>`;
}

function requiredInputItems(plan: HumanInputPlan): string {
    if (plan.requiredInputs.length === 0) {
        return '<p><em>None</em></p>';
    }
    return `<ul>${plan.requiredInputs.map(input => {
        const questions = input.questions.length > 0 ? ` &middot; ${escapeHtml(input.questions.join(' '))}` : '';
        return `<li><strong>${escapeHtml(input.category)}</strong> (${input.priority}): ${escapeHtml(input.reasoning)}${questions}</li>`;
    }).join('')}</ul>`;
}

const STAGE_LABELS: Record<StageName, string> = {
    research: 'Community research',
    knowledgeGraph: 'Knowledge graph',
    intent: 'Intent classification',
    journey: 'Journey mapping',
    contentType: 'Content type',
    businessStrategy: 'Business strategy',
    humanInputPlan: 'Human input plan',
    eeat: 'E-E-A-T assessment',
    generation: 'Content generation',
    quality: 'Quality scoring',
};

const STAGE_ORDER: StageName[] = [
    'research',
    'knowledgeGraph',
    'intent',
    'journey',
    'contentType',
    'businessStrategy',
    'humanInputPlan',
    'eeat',
    'generation',
    'quality',
];

function statusRows(result: PipelineResult): string {
    return STAGE_ORDER
        .map(stage => {
            const status = result.systemStatus[stage];
            const reason = status.reason ? ` (${escapeHtml(status.reason)})` : '';
            return `<tr><td>${STAGE_LABELS[stage]}</td><td class="${status.mode}">${status.mode}${reason}</td></tr>`;
        })
        .join('\n');
}

const CHAT_SCRIPT = `
(function () {
  var analysis = document.getElementById('analysis-data').textContent;
  var form = document.getElementById('chat-form');
  var log = document.getElementById('chat-log');
  form.addEventListener('submit', function (event) {
    event.preventDefault();
    var input = document.getElementById('chat-message');
    var message = input.value;
    if (!message) return;
    var question = document.createElement('div');
    question.textContent = 'You: ' + message;
    log.appendChild(question);
    input.value = '';
    var body = new URLSearchParams({ message: message, analysis_data: analysis });
    fetch('/api/chat', { method: 'POST', body: body })
      .then(function (res) { return res.json(); })
      .then(function (data) {
        var reply = document.createElement('div');
        reply.textContent = data.response;
        log.appendChild(reply);
      })
      .catch(function () {
        var failure = document.createElement('div');
        failure.textContent = 'The assistant is unavailable right now.';
        log.appendChild(failure);
      });
  });
})();
`;

export function renderResultsPage(result: PipelineResult): string {
    const { research, eeat, quality, contentType, document, businessStrategy, humanInputPlan } = result;

    const painPoints = PAIN_POINT_CATEGORIES
        .map(category => `<tr><td>${humanizeCategory(category)}</td><td>${research.painPoints[category]}</td></tr>`)
        .join('\n');

    return layout(`Content for ${result.request.topic}`, `
<h1>${escapeHtml(result.request.topic)}</h1>
<p><a href="/">Start over</a></p>

<div class="card">
<h2>Content strategy</h2>
<p><strong>Format:</strong> ${escapeHtml(humanizeContentType(contentType.contentType))}</p>
<p>${escapeHtml(contentType.reasoning)}</p>
<p><strong>Intent:</strong> ${escapeHtml(result.intent.primaryIntent)} (${escapeHtml(result.intent.searchStage)}) for ${escapeHtml(result.intent.targetAudience)}</p>
<p><strong>Journey stage:</strong> ${escapeHtml(result.journey.primaryStage)}</p>
</div>

<div class="card">
<h2>Business angle</h2>
<p>${escapeHtml(businessStrategy.contentAngle)}</p>
<h3>Differentiators</h3>
${listItems(businessStrategy.keyDifferentiators)}
<h3>Trust signals</h3>
${listItems(businessStrategy.trustSignals)}
<h3>Hooks</h3>
${listItems(businessStrategy.contentHooks)}
</div>

<div class="card">
<h2>Input needed from your team</h2>
${requiredInputItems(humanInputPlan)}
<h3>Review points</h3>
${listItems(humanInputPlan.collaborationPoints)}
</div>

<div class="card">
<h2>E-E-A-T: ${eeat.overallScore.toFixed(1)}/10${eeat.isYMYL ? ` <small>(YMYL: ${escapeHtml(eeat.ymylCategory)})</small>` : ''}</h2>
<table>${scoreRows(EEAT_COMPONENTS.map((component): [string, number] => [component, eeat.componentScores[component]]))}</table>
<h3>Recommendations</h3>
${listItems(eeat.improvementRecommendations)}
</div>

<div class="card">
<h2>Quality: ${quality.overallScore.toFixed(1)}/10</h2>
<p><strong>Prediction:</strong> ${escapeHtml(quality.performancePrediction)} &middot; <strong>Traffic:</strong> ${escapeHtml(quality.trafficMultiplierEstimate)}</p>
<table>${scoreRows(QUALITY_FACTORS.map((factor): [string, number] => [factor.replace(/_/g, ' '), quality.factorScores[factor]]))}</table>
<h3>Critical improvements</h3>
${listItems(quality.criticalImprovements)}
</div>

<div class="card">
<h2>Customer research</h2>
<p>${research.postsAnalyzed} posts and ${research.commentsAnalyzed} comments analyzed &middot; research quality ${research.researchQualityScore}/100 (${research.sourceTag})</p>
<table>${painPoints}</table>
<h3>In their words</h3>
${listItems(research.customerQuotes)}
<h3>What they ask</h3>
${listItems(research.frequentQuestions)}
</div>

<div class="card">
<h2>Knowledge graph</h2>
<h3>Entities</h3>
${listItems(result.knowledgeGraph.entities)}
<h3>Content gaps</h3>
${listItems(result.knowledgeGraph.contentGaps)}
</div>

<div class="card">
<h2>Generated ${escapeHtml(humanizeContentType(document.contentType))} (${document.wordCount} words, ${document.strategy})</h2>
<pre>${escapeHtml(document.bodyText)}</pre>
</div>

<div class="card">
<h2>Pipeline status</h2>
<table>${statusRows(result)}</table>
</div>

<div class="card">
<h2>Ask the assistant</h2>
<div id="chat-log"></div>
<form id="chat-form">
<input id="chat-message" type="text" placeholder="How can I improve my trust score?">
<button type="submit">Ask</button>
</form>
</div>

<script type="application/json" id="analysis-data">${embedJson(result)}</script>
<script>${CHAT_SCRIPT}</script>`);
}

export function renderErrorPage(status: number, message: string): string {
    return layout('Something went wrong', `
<h1>${status === 400 ? 'Please check your input' : 'Something went wrong'}</h1>
<div class="card">
<p>${escapeHtml(message)}</p>
<p><a href="/">Back to the form</a></p>
</div>`);
}

function humanizeContentType(value: string): string {
    return value.replace(/_/g, ' ');
}
