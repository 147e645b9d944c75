import pool from './db';

const TABLES: Record<string, string> = {
  students: `
    CREATE TABLE IF NOT EXISTS students (
      id INT AUTO_INCREMENT PRIMARY KEY,
      username VARCHAR(50) NOT NULL,
      email VARCHAR(100) NOT NULL,
      password VARCHAR(255) NOT NULL,
      full_name VARCHAR(100) NULL,
      phone VARCHAR(20) NULL,
      dob DATE NULL,
      gender VARCHAR(20) NULL,
      address VARCHAR(255) NULL,
      college VARCHAR(150) NULL,
      branch VARCHAR(100) NULL,
      degree VARCHAR(100) NULL,
      current_year VARCHAR(20) NULL,
      graduation_year INT NULL,
      cgpa DOUBLE NULL,
      tenth_marks DOUBLE NULL,
      twelfth_marks DOUBLE NULL,
      backlogs INT NOT NULL DEFAULT 0,
      technical_skills TEXT NULL,
      soft_skills TEXT NULL,
      certifications TEXT NULL,
      resume_url VARCHAR(100) NULL,
      resume_filename VARCHAR(255) NULL,
      resume_updated_at DATETIME NULL,
      profile_photo_url VARCHAR(100) NULL,
      photo_updated_at DATETIME NULL,
      profile_complete BOOLEAN NOT NULL DEFAULT false,
      is_admin BOOLEAN NOT NULL DEFAULT false,
      last_login DATETIME NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      UNIQUE KEY uq_students_email (email),
      UNIQUE KEY uq_students_username (username),
      UNIQUE KEY uq_students_phone (phone)
    )`,
  recruiters: `
    CREATE TABLE IF NOT EXISTS recruiters (
      id INT AUTO_INCREMENT PRIMARY KEY,
      username VARCHAR(50) NOT NULL,
      email VARCHAR(100) NOT NULL,
      password VARCHAR(255) NOT NULL,
      full_name VARCHAR(100) NULL,
      phone VARCHAR(20) NULL,
      company_name VARCHAR(150) NULL,
      company_website VARCHAR(255) NULL,
      linkedin_url VARCHAR(255) NULL,
      industry VARCHAR(100) NULL,
      designation VARCHAR(100) NULL,
      verified BOOLEAN NOT NULL DEFAULT true,
      profile_photo_url VARCHAR(100) NULL,
      photo_updated_at DATETIME NULL,
      profile_complete BOOLEAN NOT NULL DEFAULT false,
      is_admin BOOLEAN NOT NULL DEFAULT false,
      last_login DATETIME NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      UNIQUE KEY uq_recruiters_email (email),
      UNIQUE KEY uq_recruiters_username (username),
      UNIQUE KEY uq_recruiters_phone (phone),
      KEY idx_recruiters_company (company_name)
    )`,
  jobs: `
    CREATE TABLE IF NOT EXISTS jobs (
      id INT AUTO_INCREMENT PRIMARY KEY,
      title VARCHAR(150) NOT NULL,
      description TEXT NOT NULL,
      company_name VARCHAR(150) NOT NULL,
      location VARCHAR(150) NOT NULL,
      job_type VARCHAR(30) NOT NULL,
      salary_range VARCHAR(100) NULL,
      min_cgpa DOUBLE NOT NULL,
      eligible_branches JSON NULL,
      application_deadline DATE NOT NULL,
      recruiter_id INT NOT NULL,
      recruiter_name VARCHAR(100) NOT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NULL,
      KEY idx_jobs_created (created_at),
      CONSTRAINT fk_jobs_recruiter FOREIGN KEY (recruiter_id) REFERENCES recruiters (id) ON DELETE CASCADE
    )`,
  applications: `
    CREATE TABLE IF NOT EXISTS applications (
      id INT AUTO_INCREMENT PRIMARY KEY,
      job_id INT NOT NULL,
      student_id INT NOT NULL,
      student_name VARCHAR(100) NOT NULL,
      student_email VARCHAR(100) NOT NULL,
      student_phone VARCHAR(20) NULL,
      student_cgpa DOUBLE NOT NULL,
      student_branch VARCHAR(100) NOT NULL,
      job_title VARCHAR(150) NOT NULL,
      company_name VARCHAR(150) NOT NULL,
      status VARCHAR(30) NOT NULL DEFAULT 'Applied',
      interview_id INT NULL,
      status_updated_at DATETIME NULL,
      status_updated_by INT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      UNIQUE KEY uq_applications_job_student (job_id, student_id),
      CONSTRAINT fk_applications_job FOREIGN KEY (job_id) REFERENCES jobs (id) ON DELETE CASCADE,
      CONSTRAINT fk_applications_student FOREIGN KEY (student_id) REFERENCES students (id) ON DELETE CASCADE
    )`,
  interviews: `
    CREATE TABLE IF NOT EXISTS interviews (
      id INT AUTO_INCREMENT PRIMARY KEY,
      application_id INT NOT NULL,
      job_id INT NOT NULL,
      student_id INT NOT NULL,
      recruiter_id INT NOT NULL,
      interview_datetime DATETIME NOT NULL,
      interview_location VARCHAR(255) NOT NULL,
      interview_type VARCHAR(50) NOT NULL,
      interview_details TEXT NULL,
      status VARCHAR(20) NOT NULL DEFAULT 'Scheduled',
      result VARCHAR(10) NULL,
      feedback TEXT NULL,
      completed_at DATETIME NULL,
      completed_by INT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      KEY idx_interviews_datetime (interview_datetime),
      CONSTRAINT fk_interviews_application FOREIGN KEY (application_id) REFERENCES applications (id) ON DELETE CASCADE,
      CONSTRAINT fk_interviews_job FOREIGN KEY (job_id) REFERENCES jobs (id) ON DELETE CASCADE
    )`,
  notifications: `
    CREATE TABLE IF NOT EXISTS notifications (
      id INT AUTO_INCREMENT PRIMARY KEY,
      user_type ENUM('student', 'recruiter') NOT NULL,
      user_id INT NOT NULL,
      title VARCHAR(150) NOT NULL,
      message TEXT NOT NULL,
      \`read\` BOOLEAN NOT NULL DEFAULT false,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      KEY idx_notifications_user (user_type, user_id, created_at)
    )`,
};

export const createTables = async () => {
  const connection = await pool.getConnection();
  try {
    for (const [name, ddl] of Object.entries(TABLES)) {
      await connection.query(ddl);
      console.log(`Table ready: ${name}`);
    }
    console.log('Tables created successfully');
  } finally {
    connection.release();
  }
};

if (require.main === module) {
  createTables()
    .then(() => pool.end())
    .catch((error) => {
      console.error('Error creating tables:', error);
      process.exitCode = 1;
      return pool.end();
    });
}
