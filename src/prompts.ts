// Prompt templates for transcript question answering.

export const RAG_PROMPT = `You are a meeting assistant answering questions about one meeting. Answer using ONLY the transcript excerpts below.

**CONTEXT FROM THE MEETING:**

{context}

---

**QUESTION:**

{query}

---

**INSTRUCTIONS:**
- Use only information from the context above; do not add outside knowledge.
- If the context does not contain the answer, say so plainly.
- Be specific: include names, dates, numbers and who said what when the context has them.
- Keep the answer concise and use bullet points for lists of decisions or action items.

**ANSWER:**`;

export const STRUCTURING_PROMPT = `You are a professional meeting secretary. Rewrite the raw transcript below into a clean, well-organised meeting record.

**RAW TRANSCRIPT:**

{transcript}

---

**INSTRUCTIONS:**
- Keep every substantive statement; remove filler words, false starts and repetitions.
- Fix grammar and punctuation without changing what anyone meant.
- Attribute dialogue to speakers as **Speaker 1:**, **Speaker 2:** and so on, unless names are stated.
- Group the discussion under topic headings in the order topics came up.
- Do not invent decisions, dates or owners that the transcript does not contain.
- Separate every paragraph with a blank line.

**REQUIRED OUTPUT FORMAT:**

# Meeting Summary

[2-4 sentences on the purpose, main topics and outcomes]

---

## Key Topics Discussed

### [Topic title]

**Speaker 1:** [Cleaned dialogue]

**Speaker 2:** [Response]

---

## Decisions Made

**1. [Decision]**
   - Context: [If discussed]

---

## Action Items

- **[Owner]:** [Task] (Due: [date if mentioned])

---

## Open Questions

- [Unresolved question, if any]

Return only the structured transcript in Markdown.`;

export const FALLBACK_RESPONSE = `I don't have enough information from this meeting transcript to answer that question.

The topic may not have been discussed, or the details were not captured in the transcript. Try asking about the main topics, decisions or action items from the meeting, or rephrase your question.`;

/** Substitute `{name}` placeholders; unknown placeholders are left in place. */
export function formatPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match,
  );
}
