import { AlertDialog } from '@/components/shared/AlertDialog';
import { subscriptionAlertTitle, subscriptionUrl } from '@/utils/subscription';

export interface SubscriptionAlertProps {
  status: string;
  /** Link to the vendor's options page. */
  url?: string | null;
  onClose: () => void;
}

/** Reminder shown when an action needs a subscription the server lacks. */
export function SubscriptionAlert(props: SubscriptionAlertProps) {
  return (
    <AlertDialog
      isOpen
      title={subscriptionAlertTitle(props.status)}
      onClose={props.onClose}
      message={
        <>
          <p class="pb-2">
            The Proxmox team works very hard to make sure you are running the best software and getting stable
            updates and security enhancements, as well as quick enterprise support.
          </p>
          <p>
            Please visit{' '}
            <a class="text-blue-600 underline" target="_blank" rel="noreferrer" href={subscriptionUrl(props.url)}>
              www.proxmox.com
            </a>{' '}
            to get a list of available options.
          </p>
        </>
      }
    />
  );
}

export default SubscriptionAlert;
