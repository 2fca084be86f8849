import { Show, createEffect, createSignal, on } from 'solid-js';
import QRCode from 'qrcode';
import { TfaAPI } from '@/api/tfa';
import { Button } from '@/components/shared/Button';
import { EditWindow } from '@/components/shared/EditWindow';
import { TextField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { inputPanelWide } from '@/components/shared/Form';
import { AuthidSelector } from '@/components/Access/AuthidSelector';
import { currentUserid } from '@/stores/session';
import { logger } from '@/utils/logger';
import { randomizeSecret, totpLink, validateSecret } from '@/utils/totp';

export const DEFAULT_TOTP_ISSUER = 'Proxmox';

export interface TfaAddTotpProps {
  baseUrl?: string;
  onClose: () => void;
  onDone?: () => void;
}

/** QR code image of the `otpauth://` link, `null` while the secret is invalid. */
function TotpQrCode(props: { form: FormContext }) {
  const [image, setImage] = createSignal<string | null>(null);

  const link = () => {
    const secret = props.form.text('secret');
    const userid = props.form.text('userid');
    if (!secret || validateSecret(secret) !== null || !userid) return null;
    return totpLink(props.form.text('issuer'), userid, secret);
  };

  createEffect(
    on(link, (value) => {
      if (!value) {
        setImage(null);
        return;
      }
      QRCode.toDataURL(value, { width: 256, margin: 2 })
        .then((url) => {
          if (link() === value) setImage(url);
        })
        .catch((err: unknown) => {
          setImage(null);
          logger.error('[TfaAddTotp] Failed to render QR code', err);
        });
    }),
  );

  return (
    <div class={`${inputPanelWide} flex justify-center`}>
      <Show
        when={image()}
        fallback={<div class="flex h-64 w-64 items-center justify-center text-xs text-gray-500">No valid secret</div>}
      >
        {(src) => <img src={src()} alt="TOTP QR code" class="h-64 w-64" />}
      </Show>
    </div>
  );
}

/** Register a TOTP authenticator app. */
export function TfaAddTotp(props: TfaAddTotpProps) {
  const submit = (form: FormContext) =>
    TfaAPI.addTotp(
      {
        userid: form.text('userid'),
        description: form.text('description').trim(),
        issuer: form.text('issuer'),
        secret: form.text('secret'),
        value: form.text('value').trim(),
        password: form.text('password') || undefined,
      },
      props.baseUrl,
    );

  return (
    <EditWindow
      isOpen
      title="Add: TOTP"
      onClose={props.onClose}
      onDone={props.onDone}
      initialValues={{
        userid: currentUserid() ?? '',
        issuer: DEFAULT_TOTP_ISSUER,
        secret: randomizeSecret(),
      }}
      onSubmit={submit}
    >
      {(form) => (
        <>
          <AuthidSelector form={form} name="userid" label="User" includeTokens={false} required />
          <TextField form={form} name="description" label="Description" required />
          <TextField
            form={form}
            name="secret"
            label="Secret"
            mono
            required
            validate={validateSecret}
            trailing={
              <Button size="sm" onClick={() => form.set('secret', randomizeSecret())}>
                Randomize
              </Button>
            }
          />
          <TextField form={form} name="issuer" label="Issuer Name" required />
          <TotpQrCode form={form} />
          <TextField
            form={form}
            name="value"
            label="Verify Code"
            required
            help="Scan the QR code with your authenticator app and enter the current code."
          />
          <TextField form={form} name="password" label="Password" type="password" />
        </>
      )}
    </EditWindow>
  );
}

export default TfaAddTotp;
