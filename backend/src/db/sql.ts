// src/db/sql.ts (parameterized query snippets)

// never select password/salt into API-facing rows
const USER_COLUMNS = "id, first_name, last_name, email, created_by, created_at, updated_by, updated_at";

export const SQL = {
  selectUsers:        `SELECT ${USER_COLUMNS} FROM users ORDER BY created_at, id;`,
  selectUserById:     `SELECT ${USER_COLUMNS} FROM users WHERE id=$1;`,
  // login only
  selectLoginByEmail: `SELECT ${USER_COLUMNS}, password, salt FROM users WHERE email=$1;`,

  insertUser: `
    INSERT INTO users (id, first_name, last_name, email, password, salt, created_by, updated_by)
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
    RETURNING ${USER_COLUMNS};
  `,
  updateUser: `
    UPDATE users SET first_name=$2, last_name=$3, email=$4, updated_by=$5, updated_at=now()
    WHERE id=$1
    RETURNING ${USER_COLUMNS};
  `,
  deleteUser: `DELETE FROM users WHERE id=$1 RETURNING id;`
};
