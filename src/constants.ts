export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'folio';

export const DEFAULT_CONFIG_FILE = 'config.yaml';

// Persona
export const DEFAULT_USER_NAME = 'User';
export const DEFAULT_CHATBOT_NAME = 'Alice';

// Models
export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_SUMMARIZER_MODEL = 'gpt-4o-mini';
export const DEFAULT_GRADER_MODEL = 'gpt-4o-mini';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_REASONING_LEVEL = 'high';
export const MAX_CONTENT_LENGTH = 60000;  // Max characters of source text sent to the summarizer

// Agent
export const DEFAULT_MAX_ITERATIONS = 15;
export const DEFAULT_MEMORY_WINDOW = 5;
export const DEFAULT_AGENT_VERBOSE = false;
export const ITERATION_LIMIT_MESSAGE = 'Agent stopped due to iteration limit or time limit.';

// Knowledge store
export const DEFAULT_CHROMA_URL = 'http://localhost:8000';
export const BOOK_INFO_COLLECTION = 'book_info';
export const BOOK_REVIEWS_COLLECTION = 'book_reviews';
export const COLLECTIONS = [BOOK_INFO_COLLECTION, BOOK_REVIEWS_COLLECTION] as const;
export const DEFAULT_ADD_SIMILARITY_THRESHOLD = 0.3;
export const DEFAULT_SEARCH_SIMILARITY_THRESHOLD = 0.6;
export const DEFAULT_SEARCH_RESULTS = 3;
export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

// Video tools
export const MAX_VIDEO_RESULTS = 3;
export const MAX_TRANSCRIPT_LENGTH = 500;
export const TRANSCRIPT_LANGUAGE = 'en';
export const YOUTUBE_API_URL = 'https://www.googleapis.com/youtube/v3';
export const YOUTUBE_WATCH_URL = 'https://www.youtube.com/watch?v=';

// Encyclopedia
export const WIKIPEDIA_API_URL = 'https://en.wikipedia.org/w/api.php';

// Files
export const DEFAULT_CHAT_HISTORY_FILE = './output/chat_history.csv';
export const DEFAULT_TOOL_LOG_FILE = './output/tool_calls.log';
export const DEFAULT_CLEAR_HISTORY = false;
export const DEFAULT_ADD_TIMESTAMP = true;
export const DEFAULT_LOG_LEVEL = 'info';
export const DEFAULT_CLEAR_LOG = false;

// Terminal
export const TERMINAL_COLORS = ['none', 'black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white', 'grey'] as const;
export const DEFAULT_USER_COLOR = 'cyan';
export const DEFAULT_AI_COLOR = 'magenta';

export const EXIT_KEYWORDS = ['quit', 'exit'];
export const NEW_CHAT_MARKER = 'NEW CHAT';
