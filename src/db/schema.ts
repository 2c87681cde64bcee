const NOW = `(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

export const CREATE_TABLES_SQL = `
  -- 1. run_log
  CREATE TABLE IF NOT EXISTS run_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_type TEXT NOT NULL,
    started_at TEXT NOT NULL DEFAULT ${NOW},
    finished_at TEXT,
    status TEXT NOT NULL DEFAULT 'running',
    processed INTEGER DEFAULT 0,
    succeeded INTEGER DEFAULT 0,
    failed INTEGER DEFAULT 0,
    skipped INTEGER DEFAULT 0,
    errors TEXT,
    dry_run INTEGER DEFAULT 0
  );

  -- 2. resumes (one canonical profile per candidate email)
  CREATE TABLE IF NOT EXISTS resumes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    phone TEXT,
    location TEXT,
    summary TEXT,
    skills_json TEXT NOT NULL DEFAULT '[]',
    education_json TEXT NOT NULL DEFAULT '[]',
    experience_json TEXT NOT NULL DEFAULT '[]',
    projects_json TEXT NOT NULL DEFAULT '[]',
    certifications_json TEXT NOT NULL DEFAULT '[]',
    languages_json TEXT NOT NULL DEFAULT '[]',
    links_json TEXT,
    parsed_at TEXT NOT NULL DEFAULT ${NOW}
  );

  -- 3. customized_resumes (tailored variants, referenced by jobs)
  CREATE TABLE IF NOT EXISTS customized_resumes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    phone TEXT,
    location TEXT,
    summary TEXT,
    skills_json TEXT NOT NULL DEFAULT '[]',
    education_json TEXT NOT NULL DEFAULT '[]',
    experience_json TEXT NOT NULL DEFAULT '[]',
    projects_json TEXT NOT NULL DEFAULT '[]',
    certifications_json TEXT NOT NULL DEFAULT '[]',
    languages_json TEXT NOT NULL DEFAULT '[]',
    links_json TEXT,
    resume_link TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT ${NOW},
    updated_at TEXT NOT NULL DEFAULT ${NOW}
  );

  -- 4. jobs
  CREATE TABLE IF NOT EXISTS jobs (
    job_id TEXT PRIMARY KEY,
    company TEXT,
    job_title TEXT,
    level TEXT,
    location TEXT,
    description TEXT,
    provider TEXT,
    posted_at TEXT,
    status TEXT NOT NULL DEFAULT 'new' CHECK (status IN (
      'new', 'scored', 'applied', 'interviewing', 'offer', 'rejected', 'expired', 'archived'
    )),
    job_state TEXT NOT NULL DEFAULT 'new' CHECK (job_state IN ('new', 'done')),
    is_active INTEGER NOT NULL DEFAULT 1,
    is_interested INTEGER CHECK (is_interested IN (0, 1)),
    resume_score INTEGER CHECK (resume_score BETWEEN 0 AND 100),
    resume_score_stage TEXT NOT NULL DEFAULT 'initial' CHECK (resume_score_stage IN ('initial', 'custom')),
    customized_resume_id INTEGER,
    application_date TEXT,
    notes TEXT,
    scraped_at TEXT NOT NULL DEFAULT ${NOW},
    last_checked TEXT NOT NULL DEFAULT ${NOW},
    FOREIGN KEY (customized_resume_id) REFERENCES customized_resumes(id) ON DELETE SET NULL
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status, is_active);
  CREATE INDEX IF NOT EXISTS idx_jobs_score ON jobs(resume_score DESC);
  CREATE INDEX IF NOT EXISTS idx_jobs_last_checked ON jobs(last_checked ASC);
  CREATE INDEX IF NOT EXISTS idx_jobs_scraped_at ON jobs(scraped_at ASC);
  CREATE INDEX IF NOT EXISTS idx_jobs_customized_resume ON jobs(customized_resume_id);
`;

export const ADD_DESCRIPTION_MD_SQL = `
  ALTER TABLE jobs ADD COLUMN description_md TEXT;
`;

export const CREATE_CHECK_FAILURES_SQL = `
  CREATE TABLE IF NOT EXISTS activity_check_failures (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    job_id TEXT NOT NULL,
    attempts INTEGER NOT NULL,
    error TEXT,
    failed_at TEXT NOT NULL DEFAULT ${NOW},
    FOREIGN KEY (job_id) REFERENCES jobs(job_id)
  );

  CREATE INDEX IF NOT EXISTS idx_check_failures_job ON activity_check_failures(job_id);
`;
