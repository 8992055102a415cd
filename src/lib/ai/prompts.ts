// ---------------------------------------------------------------------------
// Prompt templates for lecture analysis, notes and syllabus roadmaps
// ---------------------------------------------------------------------------

export const ANALYSIS_SYSTEM_PROMPT =
	"You are an academic teaching analyst who processes classroom transcripts into structured insights for teachers. Your output must be a valid JSON object.";

export const NOTES_SYSTEM_PROMPT =
	"You must output a single valid JSON object only. No markdown, commentary, or preamble.";

export const SYLLABUS_SYSTEM_PROMPT =
	"You generate only valid, detailed academic planning JSON for each class day. Never produce non-JSON output.";

export function buildAnalysisPrompt(transcript: string): string {
	return `You are a university-level lecture synthesis and academic content structuring assistant.
Analyze the classroom transcript below and produce a clear, comprehensive and pedagogically organized summary of the lecture, turning raw spoken content into study notes an instructor could hand out.

Respond with ONLY a valid JSON object: no commentary, no markdown, no code fences.
The object must contain exactly these keys:

1. "topicsCovered": array of objects describing the structure and flow of the lecture.
   - "topic" (string): the primary subject or concept discussed.
   - "subtopics" (array of strings): secondary concepts under that topic, in the order they were presented. Mention transitions between topics.

2. "keyPoints": array of objects with detailed explanations per topic.
   - "topic" (string): the topic these points belong to.
   - "points" (array of strings): multi-sentence explanations covering definitions and reasoning, the instructor's arguments and insights, comparisons and cause-effect relationships, any data, formulas or terminology (explained in context), and teaching cues that helped illustrate the concept.

3. "questionsAsked": array of objects capturing the dialogue in class.
   - "question" (string): the exact or paraphrased question.
   - "who_asked" (string): Student or Instructor.
   - "who_answered" (string): Student or Instructor.
   - "topic" (string): the topic or subtopic the question relates to.
   - "answer" (string): a complete account of the response.
   - "learningValue" (string): how the exchange deepened understanding.

4. "examplesUsed": array of objects documenting illustrative material.
   - "example" (string): name or short description of the example, case study or analogy.
   - "topic" (string): the concept it illustrated.
   - "explanation" (string): step by step, how the example clarified the concept.
   - "connectionToConcept" (string): how it tied theory to practice.

5. "summaryInsight": object synthesizing the lecture.
   - "mainIdeas" (array of strings): the major themes in logical order.
   - "keyTakeaway" (string): the central insight students should retain.
   - "connectionToBroaderCourseThemes" (string): how the lecture links to course objectives, later lessons or real-world implications.

Transcript:
${transcript}`;
}

export function buildNotesPrompt(transcript: string): string {
	return `You are a university-level instructional designer. Produce final, publication-quality lecture notes from the full classroom transcript below.

The notes must read as a complete lecture document, usable both as a student handout and as the instructor's teaching script:
- give full conceptual explanations with reasoning and examples;
- weave in the instructor's cues, analogies and real-world examples;
- follow a didactic structure: introduction, subtopics, explanations, applications, summary;
- sound formally academic yet conversational.

Every list item must be multi-sentence and explanatory. No one-line answers.

Return a single valid JSON object with this structure:

{
  "main_topic": "...",
  "learning_objectives": ["..."],
  "introduction": "A full paragraph introducing the topic, its context and relevance, and how it connects to earlier or later lectures.",
  "subtopics": ["..."],
  "key_points": [
    { "subtopic": "...", "points": ["A multi-sentence paragraph: what the idea is, why it matters, how it fits the lecture."] }
  ],
  "examples_and_explanations": [
    { "subtopic": "...", "example": "The example the instructor used.", "step_by_step_explanation": "...", "connection_to_concept": "..." }
  ],
  "case_studies_or_applications": [
    { "context": "The real-world setting.", "description": "What happened or was discussed.", "lesson": "The insight it illustrates." }
  ],
  "comparisons": [
    { "concept": "The two items compared.", "feature_a": "...", "feature_b": "...", "difference": "A paragraph on how and why they differ and when each is preferred." }
  ],
  "activities_or_demonstrations": [
    { "activity": "...", "purpose": "...", "process": "...", "key_takeaway": "..." }
  ],
  "terminology_and_definitions": [
    { "term": "...", "definition": "A full-sentence contextual definition.", "context_used": "Where it came up in the lecture." }
  ],
  "instructor_tips_and_analogies": [
    { "analogy_or_tip": "...", "purpose": "...", "teaching_note": "How the instructor framed or emphasized it." }
  ],
  "questions_and_answers": [
    { "question": "...", "answer": "...", "who_asked": "Student or Instructor", "who_answered": "Student or Instructor", "teaching_value": "..." }
  ],
  "summary_and_conclusion": "A multi-paragraph synthesis tying the subtopics together.",
  "key_takeaways": ["Three to five complete sentences with the main lessons."],
  "highlighted_insight": "One statement summarizing the lecture's central message."
}

Transcript:
${transcript}`;
}

export function buildSyllabusPrompt(syllabusText: string): string {
	return `You are a senior academic planner for university-level courses.
Analyze the syllabus below and build a day-by-day instructional roadmap as a strict JSON array, one element per instructional class day. Skip entries that only cover policies, administration, grading, honor code, office hours or the schedule overview unless they are taught as actual content.

Each element must contain:
- "day": sequential integer starting at 1 (infer it when missing; do not number admin or policy entries)
- "date": the date string if the syllabus gives one, otherwise null
- "main_topic": the curriculum subject taught that day
- "subtopics": list of lesson modules, sections and demos for that day
- "objectives": measurable learning goals for the day
- "activities": labs, group work, exercises, demonstrations, discussions
- "reading": assigned chapters, papers, articles, links
- "assignments": homework, quizzes, projects, presentations or milestones due that day
- "assessment_type": the formal assessment on that day (exam, quiz, project, peer review) or "" if none
- "resources": links, software, slides, files or tools named in the syllabus
- "learning_outcomes": explicit or inferred outcomes (reuse the objectives if not separated)

Rules:
- Count only instructional days.
- If days are not clearly numbered, infer the order from the structure, date headings or context.
- Never merge days; if a day covers several subjects, list them as subtopics of that day.
- Always include midterm and final exam days, even without further detail.
- Output nothing but one syntactically valid JSON array.

Syllabus:
${syllabusText}`;
}
