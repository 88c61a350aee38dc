import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConversationEngine, is_ending_utterance } from '../src/conversation.js';
import { SessionStore } from '../src/store.js';
import type { ConversationEngineOptions } from '../src/conversation.js';
import type { LlmCapability } from '../src/llm.js';
import type { QuestionBuilder } from '../src/questions.js';

const ID = 'candidate-1';
const COMBINED = 'asha@example.com, 9876543210, 3 years, Backend Developer, Pune, Python Django PostgreSQL';

const ASK_EMAIL = 'What is your email address?';
const ASK_PHONE = 'What phone number can we reach you on?';
const ASK_NAME = 'Could you please tell me your full name?';
const NEXT_STEPS = 'Next steps: our team will review your responses within 2-3 business days. '
  + 'If you are selected, we will invite you to a technical interview with our engineering team.';

function fallback_question(tech: string): string {
  return `Explain your experience with ${tech} and describe a project where you used it.`;
}

let store: SessionStore;

beforeEach(async () => {
  store = await SessionStore.open();
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  store.close();
  vi.restoreAllMocks();
});

function engine(options: Partial<ConversationEngineOptions> = {}): ConversationEngine {
  return new ConversationEngine({ store, company_name: 'Acme Labs', ...options });
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Answers by prompt kind; field extraction waits a little to keep turns in flight. */
function scripted_llm(extraction = '{}') {
  const generate = vi.fn<LlmCapability['generate']>(
    async (system_prompt) => {
      if (system_prompt.includes('screening assistant of')) return 'Welcome aboard! What is your full name?';
      if (system_prompt.includes('friendly hiring assistant')) return 'Nice to meet you.';
      if (system_prompt.includes('You extract candidate details')) {
        await delay(10);
        return extraction;
      }
      return '';
    },
  );
  const llm: LlmCapability = { generate };
  return { llm, generate };
}

describe('is_ending_utterance', () => {
  it('should match ending keywords as whole words', () => {
    expect(is_ending_utterance('ok bye')).toBe(true);
    expect(is_ending_utterance("That’s all from me")).toBe(true);
    expect(is_ending_utterance('No more questions')).toBe(true);
    expect(is_ending_utterance('Backend Developer')).toBe(false);
    expect(is_ending_utterance('I like the frontend')).toBe(false);
  });
});

describe('ConversationEngine', () => {
  it('should greet with the template when no model is configured', async () => {
    const started = await engine().start_session(ID);

    expect(started.session_id).toBe(ID);
    expect(started.greeting).toContain('Hello! Welcome to Acme Labs.');
    expect(started.greeting).toMatch(/could you tell me your full name\?$/);
    expect(engine().get_session_summary(ID)).toEqual({
      session_id: ID,
      state: 'greeting',
      questions_completed: 0,
      total_questions: 0,
      is_complete: false,
      missing_fields: ['full_name', 'email', 'phone', 'experience_years', 'desired_position', 'location', 'tech_stack'],
      conversation_length: 1,
    });
  });

  it('should generate a session id and fall back to the default locale', async () => {
    const conversation = engine();
    const started = await conversation.start_session(undefined, 'fr-FR');
    expect(started.session_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(conversation.get_session(started.session_id)?.locale).toBe('en-US');
  });

  it('should acknowledge the name and ask for the email', async () => {
    const conversation = engine();
    await conversation.start_session(ID);

    const reply = await conversation.process_turn(ID, 'My name is Asha Rao');

    expect(reply).toBe(`Thanks, I've noted your full name.\n\n${ASK_EMAIL}`);
    expect(conversation.get_session(ID)?.state).toBe('collecting_info');
    expect(conversation.get_missing_fields(ID)).toEqual([
      'email', 'phone', 'experience_years', 'desired_position', 'location', 'tech_stack',
    ]);
  });

  it('should fill every remaining field from one reply and ask the first question', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');

    const reply = await conversation.process_turn(ID, COMBINED);

    expect(reply).toBe([
      "Thanks, I've noted your email address, phone number, years of experience, desired position, location and tech stack.",
      "Thanks, I have everything I need. Based on your tech stack (Python, Django and PostgreSQL) I've prepared 3 technical questions. Answer each one in as much detail as you like.",
      `Question 1 of 3 (Python):\n${fallback_question('Python')}`,
    ].join('\n\n'));
    expect(conversation.get_profile(ID)).toEqual({
      full_name: 'Asha Rao',
      email: 'asha@example.com',
      phone: '9876543210',
      experience_years: 3,
      desired_position: 'Backend Developer',
      location: 'Pune',
      tech_stack: ['Python', 'Django', 'PostgreSQL'],
    });
    expect(conversation.get_session(ID)?.state).toBe('asking_questions');
  });

  it('should walk through every question and finish with a summary', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');
    await conversation.process_turn(ID, COMBINED);

    const second = await conversation.process_turn(ID, 'I built data pipelines with it.');
    expect(second).toBe(`Thanks for your answer.\n\nQuestion 2 of 3 (Django):\n${fallback_question('Django')}`);

    await conversation.process_turn(ID, 'Mostly the ORM and the admin site.');
    const last = await conversation.process_turn(ID, 'I tuned slow queries with indexes.');

    expect(last).toBe([
      'Thank you, Asha Rao, for taking the time to talk with us today!',
      [
        'Here is what I recorded:',
        '• Name: Asha Rao',
        '• Email: asha@example.com',
        '• Phone: 9876543210',
        '• Experience: 3 years',
        '• Desired position: Backend Developer',
        '• Location: Pune',
        '• Tech stack: Python, Django, PostgreSQL',
      ].join('\n'),
      NEXT_STEPS,
      'We appreciate your interest in Acme Labs. Have a great day!',
    ].join('\n\n'));
    expect(conversation.get_session_summary(ID)).toEqual({
      session_id: ID,
      state: 'ending',
      questions_completed: 3,
      total_questions: 3,
      is_complete: true,
      missing_fields: [],
      conversation_length: 11,
    });
  });

  it('should end early on a farewell keyword and stay ended', async () => {
    const conversation = engine();
    await conversation.start_session(ID);

    const farewell = await conversation.process_turn(ID, 'bye');
    expect(farewell.startsWith('Thank you for taking the time to talk with us today!\n\nHere is what I recorded:\n• Name: Not provided'))
      .toBe(true);
    expect(farewell).toContain('• Experience: Not provided\n');

    const after = await conversation.process_turn(ID, 'hello again');
    expect(after).toBe("This interview has already ended. Please start a new conversation if you'd like to continue.");
    expect(conversation.get_session(ID)?.state).toBe('ending');
  });

  it('should summarise the details collected so far when ending mid-collection', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');
    await conversation.process_turn(ID, 'asha@example.com');

    const farewell = await conversation.process_turn(ID, 'Thanks, that is all');

    expect(farewell).toBe([
      'Thank you, Asha Rao, for taking the time to talk with us today!',
      [
        'Here is what I recorded:',
        '• Name: Asha Rao',
        '• Email: asha@example.com',
        '• Phone: Not provided',
        '• Experience: Not provided',
        '• Desired position: Not provided',
        '• Location: Not provided',
        '• Tech stack: Not provided',
      ].join('\n'),
      NEXT_STEPS,
      'We appreciate your interest in Acme Labs. Have a great day!',
    ].join('\n\n'));
    expect(conversation.get_session(ID)?.state).toBe('ending');
  });

  it('should end during the questions without advancing the cursor', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');
    await conversation.process_turn(ID, COMBINED);

    const farewell = await conversation.process_turn(ID, 'I need to stop here');

    expect(farewell.startsWith('Thank you, Asha Rao, for taking the time to talk with us today!')).toBe(true);
    expect(farewell).toContain('• Tech stack: Python, Django, PostgreSQL\n');
    const session = conversation.get_session(ID);
    expect(session?.state).toBe('ending');
    expect(session?.question_cursor).toBe(0);
    expect(session?.questions).toHaveLength(3);
  });

  it('should not take a greeting remark as the name', async () => {
    const conversation = engine();
    await conversation.start_session(ID);

    const first = await conversation.process_turn(ID, "Hi, I'm happy to be here");
    expect(first).toBe('Sorry, I didn\'t catch your name. You can write it as "My name is Jane Doe".');

    const second = await conversation.process_turn(ID, 'My name is Asha Rao');
    expect(second).toBe(`Thanks, I've noted your full name.\n\n${ASK_EMAIL}`);
    expect(conversation.get_profile(ID)?.full_name).toBe('Asha Rao');
  });

  it('should keep experience typed right after the phone number', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');
    await conversation.process_turn(ID, 'asha@example.com');

    const reply = await conversation.process_turn(ID, '9876543210 5 years experience');

    expect(reply).toBe("Thanks, I've noted your phone number and years of experience.\n\nWhich position are you applying for?");
    expect(conversation.get_profile(ID)?.phone).toBe('9876543210');
    expect(conversation.get_profile(ID)?.experience_years).toBe(5);
  });

  it('should answer empty input without recording a turn', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');

    const reply = await conversation.process_turn(ID, '   ');

    expect(reply).toBe(`I didn't receive any text. ${ASK_EMAIL}`);
    expect(conversation.get_session_summary(ID)?.conversation_length).toBe(3);
  });

  it('should give a retry hint when nothing was recognised', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');

    const reply = await conversation.process_turn(ID, 'not-an-email');

    expect(reply).toBe('I couldn\'t find a valid email address. Please use a format like jane@example.com.');
  });

  it('should cap long input', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'x'.repeat(1500));

    const messages = conversation.get_session(ID)?.messages ?? [];
    expect(messages[1].content).toHaveLength(1000);
  });

  it('should apologise and keep state when a turn fails, then succeed on retry', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const build_questions = vi.fn<QuestionBuilder>()
      .mockRejectedValueOnce(new Error('question service down'))
      .mockResolvedValueOnce([
        { question: 'How does the GIL affect threads?', technology: 'Python', difficulty: 'intermediate', concepts: [] },
        { question: 'What does select_related do?', technology: 'Django', difficulty: 'intermediate', concepts: [] },
      ]);
    const conversation = engine({ build_questions });
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');

    const failed = await conversation.process_turn(ID, COMBINED);
    expect(failed).toBe('Sorry, something went wrong on my side. Please send your last message again.');
    expect(error).toHaveBeenCalledTimes(1);
    expect(conversation.get_session(ID)?.state).toBe('collecting_info');
    expect(conversation.get_profile(ID)?.email).toBeNull();

    const retried = await conversation.process_turn(ID, COMBINED);
    expect(retried).toMatch(/I've prepared 2 technical questions/);
    expect(retried.endsWith('Question 1 of 2 (Python):\nHow does the GIL affect threads?')).toBe(true);
    expect(build_questions).toHaveBeenLastCalledWith(['Python', 'Django', 'PostgreSQL'], 3, {
      llm: null,
      lng: 'en-US',
      timeout_ms: 20000,
    });
  });

  it('should tell an unknown session that it expired', async () => {
    await expect(engine().process_turn('missing', 'hello')).resolves.toBe(
      'Sorry, your session has expired. Please start a new conversation.',
    );
  });

  it('should return null introspection for unknown sessions', () => {
    const conversation = engine();
    expect(conversation.get_session_summary('missing')).toBeNull();
    expect(conversation.get_missing_fields('missing')).toBeNull();
    expect(conversation.get_profile('missing')).toBeNull();
    expect(conversation.export_session('missing')).toBeNull();
    expect(conversation.has_session('missing')).toBe(false);
  });

  it('should reset a session to a fresh greeting in the same locale', async () => {
    const conversation = engine();
    await conversation.start_session(ID, 'zh-CN');
    await conversation.process_turn(ID, 'My name is Asha Rao');

    await conversation.reset_session(ID);

    const session = conversation.get_session(ID);
    expect(session?.state).toBe('greeting');
    expect(session?.locale).toBe('zh-CN');
    expect(session?.profile.full_name).toBeNull();
    expect(session?.messages).toHaveLength(1);
  });

  it('should restore an exported session', async () => {
    const conversation = engine();
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');
    const before = conversation.get_session(ID);
    const snapshot = conversation.export_session(ID);
    if (snapshot === null) throw new Error('expected a snapshot');

    await conversation.reset_session(ID);
    await expect(conversation.import_session(snapshot)).resolves.toBe(ID);

    expect(conversation.get_session(ID)).toEqual(before);
    await expect(conversation.process_turn(ID, 'asha@example.com')).resolves.toBe(
      `Thanks, I've noted your email address.\n\n${ASK_PHONE}`,
    );
  });

  it('should reject a malformed snapshot', async () => {
    await expect(engine().import_session('{"version": 2}')).rejects.toThrow('Invalid session snapshot');
    await expect(engine().import_session('not json')).rejects.toThrow('Invalid session snapshot: not valid JSON');
  });

  it('should run concurrent turns for one session in order', async () => {
    const { llm, generate } = scripted_llm();
    const conversation = engine({ llm, llm_assist: true });
    await conversation.start_session(ID);

    const [first, second] = await Promise.all([
      conversation.process_turn(ID, 'My name is Asha Rao'),
      conversation.process_turn(ID, 'asha@example.com'),
    ]);

    expect(first).toBe(`Thanks, I've noted your full name.\n\n${ASK_EMAIL}`);
    expect(second).toBe(`Thanks, I've noted your email address.\n\n${ASK_PHONE}`);
    expect(conversation.get_profile(ID)?.full_name).toBe('Asha Rao');
    expect(conversation.get_profile(ID)?.email).toBe('asha@example.com');
    expect(generate).toHaveBeenCalledTimes(3);
  });

  it('should use the model greeting and free replies when assistance is on', async () => {
    const { llm } = scripted_llm();
    const conversation = engine({ llm, llm_assist: true });

    const started = await conversation.start_session(ID);
    expect(started.greeting).toBe('Welcome aboard! What is your full name?');

    const reply = await conversation.process_turn(ID, 'Hello there');
    expect(reply).toBe(`Nice to meet you.\n\n${ASK_NAME}`);
  });

  it('should merge fields the model found alongside pattern matches', async () => {
    const { llm, generate } = scripted_llm('```json\n{"phone": "+91 98765 43210", "location": "Pune", "email": null}\n```');
    const conversation = engine({ llm, llm_assist: true });
    await conversation.start_session(ID);
    await conversation.process_turn(ID, 'My name is Asha Rao');

    const reply = await conversation.process_turn(ID, 'asha@example.com');

    expect(reply).toBe(
      "Thanks, I've noted your email address, phone number and location.\n\nHow many years of professional experience do you have?",
    );
    expect(conversation.get_profile(ID)?.phone).toBe('+91 98765 43210');
    const [, user_prompt] = generate.mock.calls[generate.mock.calls.length - 1];
    expect(user_prompt).toContain('Fields to look for: phone, experience_years, desired_position, location, tech_stack');
  });

  it('should ignore the model unless assistance is on', async () => {
    const { llm, generate } = scripted_llm();
    const conversation = engine({ llm });

    const started = await conversation.start_session(ID);

    expect(started.greeting).toContain('Hello! Welcome to Acme Labs.');
    expect(generate).not.toHaveBeenCalled();
  });

  it('should sweep only sessions idle past the limit', async () => {
    let clock = 1000;
    const conversation = engine({ now: () => clock });
    await conversation.start_session('old');
    clock = 5000;
    await conversation.start_session('fresh');

    expect(conversation.sweep_idle_sessions(2000)).toEqual(['old']);
    expect(conversation.has_session('old')).toBe(false);
    expect(conversation.has_session('fresh')).toBe(true);
  });
});
