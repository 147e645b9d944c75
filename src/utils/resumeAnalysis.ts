import axios from 'axios';
import config from '../config';

export interface ResumeSummary {
  candidate_summary: string;
  key_skills: string;
  job_fit: string;
}

export interface JobContext {
  title?: string | null;
  description?: string | null;
}

interface GeminiResponse {
  candidates?: {
    content?: {
      parts?: { text?: string }[];
    };
  }[];
}

export const EMPTY_RESUME_SUMMARY: ResumeSummary = {
  candidate_summary: '<p>No text content could be extracted from the resume.</p>',
  key_skills: '<p>No skills could be identified.</p>',
  job_fit: '<p>Unable to analyze job fit due to missing resume content.</p>',
};

const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/models';

export const isResumeAnalysisConfigured = () => Boolean(config.gemini.apiKey);

const rawSummary = (text: string): ResumeSummary => ({
  candidate_summary: `<p>${text}</p>`,
  key_skills: '<p>Skills extraction failed.</p>',
  job_fit: '<p>Job fit analysis failed.</p>',
});

export const buildResumePrompt = (resumeText: string, job: JobContext = {}) => {
  const jobContext =
    job.title && job.description
      ? `\nThe candidate has applied for the position of ${job.title}.\nJob Description: ${job.description}\n`
      : '';

  return `You are an expert HR professional analyzing a resume. Please provide a comprehensive analysis of the following resume content.
Format your response in HTML with appropriate tags (<p>, <ul>, <li>, <strong>, etc.).

Resume Content:
${resumeText}
${jobContext}
Please provide the following sections:
1. Candidate Summary: A brief overview of the candidate's background, experience, and qualifications.
2. Key Skills: A bullet-point list of the candidate's key skills and competencies.
3. Job Fit Analysis: An assessment of how well the candidate's profile matches the job requirements.

Return your response as a JSON object with the following structure:
{
  "candidate_summary": "HTML formatted candidate summary",
  "key_skills": "HTML formatted list of key skills",
  "job_fit": "HTML formatted job fit analysis"
}`;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Reads the JSON object between the first `{` and the last `}` of a model reply. */
export const parseSummaryResponse = (responseText: string): ResumeSummary => {
  const start = responseText.indexOf('{');
  const end = responseText.lastIndexOf('}') + 1;
  if (start < 0 || end <= start) return rawSummary(responseText);

  try {
    const parsed: unknown = JSON.parse(responseText.slice(start, end));
    if (!isRecord(parsed)) return rawSummary(responseText);

    const fallback = rawSummary(responseText);
    const pick = (key: keyof ResumeSummary) => {
      const value = parsed[key];
      return typeof value === 'string' ? value : fallback[key];
    };
    return {
      candidate_summary: pick('candidate_summary'),
      key_skills: pick('key_skills'),
      job_fit: pick('job_fit'),
    };
  } catch (error) {
    console.error('Error parsing JSON response:', error);
    return rawSummary(responseText);
  }
};

const describeError = (error: unknown) => {
  if (axios.isAxiosError(error)) {
    return error.response ? `${error.message} (HTTP ${error.response.status})` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
};

export const generateContent = async (model: string, prompt: string): Promise<string> => {
  const response = await axios.post<GeminiResponse>(
    `${GEMINI_BASE_URL}/${model}:generateContent`,
    { contents: [{ parts: [{ text: prompt }] }] },
    {
      params: { key: config.gemini.apiKey },
      headers: { 'Content-Type': 'application/json' },
      timeout: 60_000,
    }
  );

  const parts = response.data.candidates?.[0]?.content?.parts ?? [];
  const text = parts.map((part) => part.text ?? '').join('');
  if (!text) {
    throw new Error(`Empty response from ${model}`);
  }
  return text;
};

/**
 * Summarises a resume with the primary Gemini model, falling back to the
 * secondary model (whose raw text is used as the summary) when the first call
 * fails.
 */
export const generateResumeSummary = async (resumeText: string, job: JobContext = {}): Promise<ResumeSummary> => {
  if (!resumeText.trim()) {
    return EMPTY_RESUME_SUMMARY;
  }

  const prompt = buildResumePrompt(resumeText, job);

  try {
    return parseSummaryResponse(await generateContent(config.gemini.model, prompt));
  } catch (error) {
    console.error('Error generating summary:', error);

    try {
      return rawSummary(await generateContent(config.gemini.fallbackModel, prompt));
    } catch (fallbackError) {
      console.error('Error generating summary with fallback model:', fallbackError);
      return rawSummary(
        `Error generating summary: Error generating summary with primary model: ${describeError(error)}\n\nError with fallback model: ${describeError(fallbackError)}`
      );
    }
  }
};
