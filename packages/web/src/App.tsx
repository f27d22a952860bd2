import { useEffect, useState } from 'react';
import type { ReplyOptionsResponse, Role, UserPublic } from '@replydesk/contracts';

import { createUser, generateReply, getReplyOptions, getSession, listUsers, login, logout } from './lib/api';
import { humanizeError, isUnauthorized } from './lib/errors';
import { missingReplyFields } from './lib/form';
import { liveToken, viewFromSession } from './lib/session';
import type { AppView } from './lib/session';
import { clearAuth, loadAuth, saveAuth } from './lib/storage';

export function App() {
  const [view, setView] = useState<AppView>({ kind: 'loading' });
  const [token, setToken] = useState<string>('');
  const [bootError, setBootError] = useState<string>('');

  // Session guard: ask the server which view this session reaches.
  async function refreshView(nextToken: string) {
    try {
      const res = await getSession(nextToken || undefined);
      const next = viewFromSession(res, Boolean(nextToken));
      if (next.kind === 'login' || (next.kind === 'main' && !next.user)) {
        clearAuth();
        setToken('');
      }
      setView(next);
    } catch (e) {
      setBootError(humanizeError(e));
      setView({ kind: 'login' });
    }
  }

  useEffect(() => {
    const stored = loadAuth();
    const t = liveToken(stored, Date.now()) ?? '';
    if (stored && !t) clearAuth();
    setToken(t);
    void refreshView(t);
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  async function doLogin(username: string, password: string) {
    setBootError('');
    try {
      const out = await login({ username, password });
      saveAuth({ token: out.token, expiresAt: out.expiresAt, user: out.user });
      setToken(out.token);
      await refreshView(out.token);
    } catch (e) {
      setBootError(humanizeError(e));
    }
  }

  async function doLogout() {
    const t = token;
    clearAuth();
    setToken('');
    if (t) {
      try {
        await logout(t);
      } catch (e) {
        console.warn('logout failed', e);
      }
    }
    await refreshView('');
  }

  function onUnauthorized() {
    void refreshView(token);
  }

  if (view.kind === 'loading') {
    return (
      <main className="app-shell">
        <div className="muted">A carregar...</div>
      </main>
    );
  }

  if (view.kind === 'login') {
    return (
      <main className="app-shell">
        <div className="login-card">
          <div className="brand">
            <div className="brand-title">Gerador de Respostas</div>
            <div className="brand-subtitle">Apoio ao cliente</div>
          </div>
          {view.notice ? <div className="notice">{view.notice}</div> : null}
          <LoginView onLogin={(u, p) => void doLogin(u, p)} error={bootError} />
        </div>
      </main>
    );
  }

  return (
    <main className="layout">
      <header className="topbar">
        <div className="brand-title">Gerador de Respostas</div>
        <div className="user-row">
          {view.user ? (
            <>
              <div className="user-meta">
                <div className="user-name">{view.user.displayName}</div>
                <div className="muted small">{view.user.role}</div>
              </div>
              <button className="btn" onClick={() => void doLogout()}>
                Terminar sessão
              </button>
            </>
          ) : (
            <button className="btn" onClick={() => setView({ kind: 'login' })}>
              Iniciar sessão
            </button>
          )}
        </div>
      </header>
      <MainView token={token} onUnauthorized={onUnauthorized} />
      {view.canManageUsers ? <UsersPanel token={token} onUnauthorized={onUnauthorized} /> : null}
    </main>
  );
}

function LoginView(props: { onLogin: (u: string, p: string) => void; error?: string }) {
  const [username, setUsername] = useState<string>('');
  const [password, setPassword] = useState<string>('');
  return (
    <form
      className="login-form"
      onSubmit={(e) => {
        e.preventDefault();
        props.onLogin(username.trim(), password);
      }}
    >
      <label className="field">
        <div className="field-label">Utilizador</div>
        <input value={username} onChange={(e) => setUsername(e.target.value)} autoComplete="username" />
      </label>
      <label className="field">
        <div className="field-label">Palavra-passe</div>
        <input value={password} onChange={(e) => setPassword(e.target.value)} type="password" autoComplete="current-password" />
      </label>
      {props.error ? <div className="error">{props.error}</div> : null}
      <button className="btn primary" type="submit">
        Entrar
      </button>
    </form>
  );
}

function MainView(props: { token: string; onUnauthorized: () => void }) {
  const [options, setOptions] = useState<ReplyOptionsResponse | null>(null);
  const [email, setEmail] = useState<string>('');
  const [intents, setIntents] = useState<string[]>([]);
  const [tone, setTone] = useState<string>('');
  const [length, setLength] = useState<string>('');
  const [managerNotes, setManagerNotes] = useState<string>('');
  const [reply, setReply] = useState<string>('');
  const [notice, setNotice] = useState<string>('');
  const [generating, setGenerating] = useState<boolean>(false);

  useEffect(() => {
    let cancelled = false;
    async function run() {
      try {
        const out = await getReplyOptions(props.token || undefined);
        if (cancelled) return;
        setOptions(out);
        setTone(out.defaults.tone);
        setLength(out.defaults.length);
      } catch (e) {
        if (cancelled) return;
        if (isUnauthorized(e)) props.onUnauthorized();
        else setNotice(humanizeError(e));
      }
    }
    void run();
    return () => {
      cancelled = true;
    };
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [props.token]);

  function toggleIntent(id: string, checked: boolean) {
    setIntents((prev) => (checked ? [...prev, id] : prev.filter((x) => x !== id)));
  }

  async function handleGenerate() {
    const missing = missingReplyFields({ email, intents });
    if (missing.length > 0) {
      setNotice(missing.join(' · '));
      return;
    }
    setGenerating(true);
    setNotice('');
    try {
      const out = await generateReply(props.token || undefined, { email, intents, tone, length, managerNotes });
      setReply(out.reply);
    } catch (e) {
      if (isUnauthorized(e)) props.onUnauthorized();
      else setNotice(humanizeError(e));
    } finally {
      setGenerating(false);
    }
  }

  if (!options) {
    return <section className="panel">{notice ? <div className="error">{notice}</div> : <div className="muted">A carregar...</div>}</section>;
  }

  return (
    <section className="panel">
      <label className="field">
        <div className="field-label">Coloca aqui o email:</div>
        <textarea className="email-input" rows={10} value={email} onChange={(e) => setEmail(e.target.value)} />
      </label>

      <fieldset className="field">
        <legend className="field-label">Tipo de resposta:</legend>
        {options.intents.map((o) => (
          <label key={o.id} className="check">
            <input type="checkbox" checked={intents.includes(o.id)} onChange={(e) => toggleIntent(o.id, e.target.checked)} />
            <span>{o.label}</span>
          </label>
        ))}
      </fieldset>

      <div className="row">
        <label className="field">
          <div className="field-label">Tom</div>
          <select value={tone} onChange={(e) => setTone(e.target.value)}>
            {options.tones.map((o) => (
              <option key={o.id} value={o.id}>
                {o.label}
              </option>
            ))}
          </select>
        </label>
        <label className="field">
          <div className="field-label">Tamanho</div>
          <select value={length} onChange={(e) => setLength(e.target.value)}>
            {options.lengths.map((o) => (
              <option key={o.id} value={o.id}>
                {o.label}
              </option>
            ))}
          </select>
        </label>
      </div>

      <label className="field">
        <div className="field-label">Adicione notas adicionais, caso queira</div>
        <textarea rows={3} value={managerNotes} onChange={(e) => setManagerNotes(e.target.value)} />
      </label>

      {notice ? <div className="notice">{notice}</div> : null}
      <button className="btn primary" disabled={generating} onClick={() => void handleGenerate()}>
        {generating ? 'A gerar...' : 'Gerar resposta'}
      </button>

      {reply ? (
        <div className="result">
          <h2>Resposta sugerida:</h2>
          <textarea className="reply-output" rows={12} readOnly value={reply} />
        </div>
      ) : null}
    </section>
  );
}

function UsersPanel(props: { token: string; onUnauthorized: () => void }) {
  const [users, setUsers] = useState<UserPublic[]>([]);
  const [username, setUsername] = useState<string>('');
  const [displayName, setDisplayName] = useState<string>('');
  const [password, setPassword] = useState<string>('');
  const [role, setRole] = useState<Role>('user');
  const [notice, setNotice] = useState<string>('');

  async function reload() {
    try {
      const out = await listUsers(props.token);
      setUsers(out.users);
    } catch (e) {
      if (isUnauthorized(e)) props.onUnauthorized();
      else setNotice(humanizeError(e));
    }
  }

  useEffect(() => {
    void reload();
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [props.token]);

  async function handleCreate() {
    setNotice('');
    try {
      const created = await createUser(props.token, { username: username.trim(), displayName: displayName.trim(), password, role });
      setNotice(`Utilizador ${created.username} criado.`);
      setUsername('');
      setDisplayName('');
      setPassword('');
      setRole('user');
      await reload();
    } catch (e) {
      if (isUnauthorized(e)) props.onUnauthorized();
      else setNotice(humanizeError(e));
    }
  }

  return (
    <section className="panel">
      <h2>Gerir utilizadores</h2>
      <table className="users">
        <tbody>
          {users.map((u) => (
            <tr key={u.username}>
              <td>{u.username}</td>
              <td>{u.displayName}</td>
              <td className="muted small">{u.role}</td>
            </tr>
          ))}
        </tbody>
      </table>
      <form
        className="inline"
        onSubmit={(e) => {
          e.preventDefault();
          void handleCreate();
        }}
      >
        <input value={username} onChange={(e) => setUsername(e.target.value)} placeholder="utilizador" />
        <input value={displayName} onChange={(e) => setDisplayName(e.target.value)} placeholder="nome" />
        <input value={password} onChange={(e) => setPassword(e.target.value)} placeholder="palavra-passe" type="password" autoComplete="new-password" />
        <select value={role} onChange={(e) => setRole(e.target.value === 'admin' ? 'admin' : 'user')}>
          <option value="user">user</option>
          <option value="admin">admin</option>
        </select>
        <button className="btn" type="submit">
          Criar
        </button>
      </form>
      {notice ? <div className="notice">{notice}</div> : null}
    </section>
  );
}
