// src/services/prompts.ts
// Chat messages for the three generation calls: insight, topic relevance, digest summary.

import type { ChatMessage, LearnerContext } from "../domain/types.js";

export const INSIGHT_BODY_CHARS = 1000;
export const RELEVANCE_BODY_CHARS = 500;

export function insightMessages(body: string, ctx: LearnerContext, bodyChars = INSIGHT_BODY_CHARS): ChatMessage[] {
  const prompt = `You are a learning coach. Using the content below and the learner's context, write one concise, actionable learning insight.

Learner context:
- Current week: ${ctx.current_week}
- Topics: ${ctx.current_topics.join(", ")}
- Goals: ${ctx.learning_goals}

Content:
${body.slice(0, bodyChars)}

The insight must:
1. Fit the learner's current week and topics
2. Give a concrete takeaway or next step
3. Match the learner's level
4. Be 2-3 sentences long

Reply with the insight text only, no reasoning, tags or preamble.

Insight:`;
  return [
    {
      role: "system",
      content: "You are an expert learning coach who writes personalized, actionable insights. Reply with the final insight only."
    },
    { role: "user", content: prompt }
  ];
}

export function relevanceMessages(body: string, topics: string[], bodyChars = RELEVANCE_BODY_CHARS): ChatMessage[] {
  const prompt = `Rate how relevant this content is to the learning topics, from 0.0 to 1.0.

Topics: ${topics.join(", ")}

Content:
${body.slice(0, bodyChars)}

Reply with a single number between 0.0 (not relevant) and 1.0 (highly relevant).

Score:`;
  return [
    { role: "system", content: "You rate content relevance. Reply with a decimal number only." },
    { role: "user", content: prompt }
  ];
}

export function summaryMessages(insights: string[], ctx: LearnerContext): ChatMessage[] {
  const listed = insights.map((text, i) => `${i + 1}. ${text}`).join("\n");
  const prompt = `Write a short, motivating introduction for today's learning digest.

Context:
- Week ${ctx.current_week} of the learning journey
- Focus topics: ${ctx.current_topics.join(", ")}
- Number of insights: ${insights.length}

Insights:
${listed}

In 2-3 sentences:
1. Acknowledge the learner's progress
2. Name the common theme of today's insights
3. Encourage them to dig in

Introduction:`;
  return [
    { role: "system", content: "You are a supportive learning coach." },
    { role: "user", content: prompt }
  ];
}
