export const BARD_HOST = 'https://gemini.google.com'

export const LANDING_PAGE_URL = `${BARD_HOST}/`

export const STREAM_GENERATE_URL = `${BARD_HOST}/_/BardChatUi/data/assistant.lamda.BardFrontendService/StreamGenerate`

export const BATCH_EXECUTE_URL = `${BARD_HOST}/_/BardChatUi/data/batchexecute`

export const IMAGE_UPLOAD_URL = 'https://content-push.googleapis.com/upload/'

export const SHARE_URL_PREFIX = 'https://g.co/bard/share/'

export const DEFAULT_BUILD_LABEL = 'boq_assistant-bard-web-server_20230912.07_p1'

export const REQUEST_ID_STEP = 100000

export const SESSION_HEADERS = {
    'X-Same-Domain': '1',
    'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; WOW64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.114 Safari/537.36',
    'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
    Origin: BARD_HOST,
    Referer: LANDING_PAGE_URL
}

export const IMAGE_UPLOAD_HEADERS = {
    Accept: '*/*',
    'Accept-Language': 'en-US,en;q=0.7',
    'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
    Origin: BARD_HOST,
    Referer: LANDING_PAGE_URL,
    'Push-Id': 'feeds/mcudyrk2a4khkz',
    'X-Tenant-Id': 'bard-storage'
}

/** Cookies the front end rotates; all of them are needed in multi-cookie mode. */
export const REQUIRED_COOKIES = [
    '__Secure-1PSID',
    '__Secure-1PSIDTS',
    '__Secure-1PSIDCC',
    'NID'
]

/** Languages the front end answers in natively. Others are pivoted through English. */
export const ALLOWED_LANGUAGES = new Set([
    'en',
    'ko',
    'ja',
    'english',
    'korean',
    'japanese'
])

export const PIVOT_LANGUAGE = 'en'

export enum RpcId {
    SPEECH = 'XqA3Ic',
    EXPORT_CONVERSATION = 'fuVx7',
    EXPORT_REPLIT = 'qACoKe'
}

export enum Tool {
    GMAIL = 'gmail',
    GOOGLE_DOCS = 'google_docs',
    GOOGLE_DRIVE = 'google_drive',
    GOOGLE_FLIGHTS = 'google_flights',
    GOOGLE_HOTELS = 'google_hotels',
    GOOGLE_MAPS = 'google_maps',
    YOUTUBE = 'youtube'
}

export const TOOL_SELECTORS: Record<Tool, string[]> = {
    [Tool.GMAIL]: ['workspace_tool', 'Gmail'],
    [Tool.GOOGLE_DOCS]: ['workspace_tool', 'Google Docs'],
    [Tool.GOOGLE_DRIVE]: ['workspace_tool', 'Google Drive'],
    [Tool.GOOGLE_FLIGHTS]: ['google_flights_tool'],
    [Tool.GOOGLE_HOTELS]: ['google_hotels_tool'],
    [Tool.GOOGLE_MAPS]: ['google_map_tool'],
    [Tool.YOUTUBE]: ['youtube_tool']
}

// markdown fence language -> entry file of the sandbox project
export const REPLIT_SUPPORT_PROGRAM_LANGUAGES: Record<string, string> = {
    python: 'main.py',
    javascript: 'index.js',
    go: 'main.go',
    java: 'Main.java',
    kotlin: 'Main.kt',
    php: 'index.php',
    'c#': 'main.cs',
    swift: 'main.swift',
    r: 'main.r',
    ruby: 'main.rb',
    c: 'main.c',
    'c++': 'main.cpp',
    matlab: 'main.m',
    typescript: 'main.ts',
    scala: 'main.scala',
    sql: 'main.sql',
    html: 'index.html',
    css: 'style.css',
    nosql: 'main.nosql',
    rust: 'main.rs',
    perl: 'main.pl'
}
